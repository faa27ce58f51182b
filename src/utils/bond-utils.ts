import type { Bond, Molecule } from 'types';
import { BondType } from 'types';

export function bondKey(atom1: number, atom2: number): string {
  return `${Math.min(atom1, atom2)}-${Math.max(atom1, atom2)}`;
}

export function getBondsForAtom(bonds: Bond[], atomId: number): Bond[] {
  return bonds.filter(b => b.atom1 === atomId || b.atom2 === atomId);
}

export function otherAtom(bond: Bond, atomId: number): number {
  return bond.atom1 === atomId ? bond.atom2 : bond.atom1;
}

/**
 * Bond order used for hydrogen and valence bookkeeping.
 * Aromatic bonds count as 1; aromatic valences already discount the pi bond.
 */
export function bondOrder(type: BondType): number {
  switch (type) {
    case BondType.SINGLE:
    case BondType.AROMATIC:
      return 1;
    case BondType.DOUBLE:
      return 2;
    case BondType.TRIPLE:
      return 3;
    case BondType.QUADRUPLE:
      return 4;
  }
}

export interface Neighbor {
  atomId: number;
  bond: Bond;
}

/**
 * Adjacency list keyed by atom id, neighbours kept in bond order
 */
export function buildAdjacency(mol: Molecule): Map<number, Neighbor[]> {
  const adjacency = new Map<number, Neighbor[]>();
  for (const atom of mol.atoms) {
    adjacency.set(atom.id, []);
  }
  for (const bond of mol.bonds) {
    adjacency.get(bond.atom1)?.push({ atomId: bond.atom2, bond });
    adjacency.get(bond.atom2)?.push({ atomId: bond.atom1, bond });
  }
  return adjacency;
}
