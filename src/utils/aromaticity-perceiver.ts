import type { Atom, Bond, Molecule } from 'types';
import { BondType } from 'types';
import { bondKey, getBondsForAtom, otherAtom } from './bond-utils';
import { getRingBondKeys } from './ring-utils';
import { findSSSR } from './ring-finder';

/**
 * Hückel perception over the smallest set of smallest rings.
 *
 * Rings are revisited until nothing changes so that fused systems written in
 * Kekulé form pick up aromaticity from a neighbouring ring that was already
 * perceived (the shared atoms then count one electron each).
 * Aromatic-typed bonds outside every ring are demoted to single.
 * Mutates the molecule; only called while a molecule is being built.
 */
export function perceiveAromaticity(mol: Molecule): void {
  const rings = mol.rings ?? findSSSR(mol.atoms, mol.bonds);
  const atomsById = new Map(mol.atoms.map(a => [a.id, a]));
  const bondsByKey = new Map(mol.bonds.map(b => [bondKey(b.atom1, b.atom2), b]));

  let changed = true;
  while (changed) {
    changed = false;
    for (const ring of rings) {
      const ringBonds = getRingBondKeys(ring).map(key => bondsByKey.get(key));
      const ringAtoms = ring.map(id => atomsById.get(id));
      if (isFullyAromatic(ringAtoms, ringBonds)) continue;

      const electrons = countRingPiElectrons(ring, mol, atomsById);
      if (electrons === null || electrons % 4 !== 2) continue;

      for (const atom of ringAtoms) {
        if (atom) atom.aromatic = true;
      }
      for (const bond of ringBonds) {
        if (bond) bond.type = BondType.AROMATIC;
      }
      changed = true;
    }
  }

  const ringBondKeys = new Set(rings.flatMap(ring => getRingBondKeys(ring)));
  for (const bond of mol.bonds) {
    if (bond.type === BondType.AROMATIC && !ringBondKeys.has(bondKey(bond.atom1, bond.atom2))) {
      bond.type = BondType.SINGLE;
    }
  }
}

function isFullyAromatic(atoms: (Atom | undefined)[], bonds: (Bond | undefined)[]): boolean {
  return atoms.every(a => a?.aromatic === true) && bonds.every(b => b?.type === BondType.AROMATIC);
}

function countRingPiElectrons(ring: number[], mol: Molecule, atomsById: Map<number, Atom>): number | null {
  const ringSet = new Set(ring);
  let total = 0;
  for (const atomId of ring) {
    const atom = atomsById.get(atomId);
    if (!atom) return null;
    const contribution = piElectrons(atom, ringSet, mol.bonds, atomsById);
    if (contribution === null) return null;
    total += contribution;
  }
  return total;
}

/**
 * Electrons an atom donates to the ring's pi system, or null when it
 * cannot take part (sp3 carbon, triple bond, exocyclic C=C).
 */
function piElectrons(
  atom: Atom,
  ringSet: Set<number>,
  bonds: Bond[],
  atomsById: Map<number, Atom>
): number | null {
  const atomBonds = getBondsForAtom(bonds, atom.id);
  if (atomBonds.some(b => b.type === BondType.TRIPLE || b.type === BondType.QUADRUPLE)) return null;

  const doubles = atomBonds.filter(b => b.type === BondType.DOUBLE);
  if (doubles.some(b => ringSet.has(otherAtom(b, atom.id)))) return 1;

  const exocyclic = doubles[0];
  if (exocyclic) {
    const partner = atomsById.get(otherAtom(exocyclic, atom.id));
    if (partner?.aromatic) return 1;
    if (atom.atomicNumber === 6 && partner && partner.atomicNumber !== 6) return 0;
    return null;
  }

  const connections = atomBonds.length + atom.hydrogens;

  if (atom.aromatic) {
    switch (atom.symbol) {
      case 'C':
        if (atom.charge < 0) return 2;
        if (atom.charge > 0) return 0;
        return 1;
      case 'N':
      case 'P':
        if (atom.charge > 0) return 1;
        return atom.hydrogens > 0 || atomBonds.length >= 3 ? 2 : 1;
      case 'O':
      case 'S':
      case 'Se':
        return atom.charge > 0 ? 1 : 2;
      case 'B':
        return 0;
      default:
        return null;
    }
  }

  switch (atom.symbol) {
    case 'N':
    case 'P':
      return atom.charge === 0 && connections === 3 ? 2 : null;
    case 'O':
    case 'S':
    case 'Se':
      return atom.charge === 0 && connections === 2 ? 2 : null;
    case 'C':
      if (atom.charge === -1) return 2;
      if (atom.charge === 1) return 0;
      return null;
    case 'B':
      return connections === 3 ? 0 : null;
    default:
      return null;
  }
}
