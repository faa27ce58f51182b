import type { Atom, Bond } from 'types';
import { findSSSR } from './ring-finder';
import { bondKey } from './bond-utils';

export interface RingAnalysis {
  rings: number[][];
  ringBondSet: Set<string>;
  isAtomInRing: (atomId: number) => boolean;
}

export function analyzeRings(atoms: Atom[], bonds: Bond[]): RingAnalysis {
  const rings = findSSSR(atoms, bonds);
  const ringAtoms = new Set(rings.flat());
  const ringBondSet = new Set(rings.flatMap(ring => getRingBondKeys(ring)));

  return {
    rings,
    ringBondSet,
    isAtomInRing: (atomId: number) => ringAtoms.has(atomId),
  };
}

/**
 * Keys of the bonds joining consecutive ring atoms (rings are stored in ring order)
 */
export function getRingBondKeys(ring: number[]): string[] {
  const keys: string[] = [];
  for (let i = 0; i < ring.length; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % ring.length];
    if (a === undefined || b === undefined) continue;
    keys.push(bondKey(a, b));
  }
  return keys;
}
