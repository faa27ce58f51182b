import type { Molecule } from 'types';
import { analyzeRings } from './ring-utils';
import { bondKey, getBondsForAtom } from './bond-utils';

/**
 * Pre-computes ring membership and degree on a freshly built molecule.
 * Only the parser and the codec call this, before the molecule is handed out.
 */
export function enrichMolecule(mol: Molecule): void {
  const ringInfo = analyzeRings(mol.atoms, mol.bonds);
  mol.rings = ringInfo.rings;

  for (const atom of mol.atoms) {
    atom.degree = getBondsForAtom(mol.bonds, atom.id).length;
    atom.isInRing = ringInfo.isAtomInRing(atom.id);
  }
  for (const bond of mol.bonds) {
    bond.isInRing = ringInfo.ringBondSet.has(bondKey(bond.atom1, bond.atom2));
  }
}
