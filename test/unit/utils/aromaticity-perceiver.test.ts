import { describe, it, expect } from 'vitest';
import { parseMolecule } from 'src/parser';
import { BondType } from 'types';

const aromaticAtoms = (smiles: string) => parseMolecule(smiles).atoms.map(a => a.aromatic);
const allAromatic = (smiles: string) => {
  const molecule = parseMolecule(smiles);
  return molecule.atoms.every(a => a.aromatic) && molecule.bonds.every(b => b.type === BondType.AROMATIC);
};

describe('aromaticity perception', () => {
  describe('Kekulé rings', () => {
    it('perceives benzene', () => {
      expect(allAromatic('C1=CC=CC=C1')).toBe(true);
    });

    it('perceives pyridine', () => {
      expect(allAromatic('N1=CC=CC=C1')).toBe(true);
    });

    it('perceives five-membered heteroaromatics', () => {
      expect(allAromatic('C1=CNC=C1')).toBe(true);
      expect(allAromatic('C1=COC=C1')).toBe(true);
      expect(allAromatic('C1=CSC=C1')).toBe(true);
    });

    it('perceives fused rings from either side', () => {
      expect(allAromatic('C1=CC=C2C=CC=CC2=C1')).toBe(true);
    });
  });

  describe('non-aromatic rings', () => {
    it('leaves cyclohexene alone', () => {
      expect(aromaticAtoms('C1=CCCCC1')).toEqual([false, false, false, false, false, false]);
    });

    it('rejects four pi electrons', () => {
      expect(aromaticAtoms('C1=CC=C1')).toEqual([false, false, false, false]);
    });
  });

  it('keeps substituent bonds single', () => {
    const molecule = parseMolecule('Cc1ccccc1');
    expect(molecule.bonds[0]?.type).toBe(BondType.SINGLE);
    expect(molecule.atoms[0]?.aromatic).toBe(false);
  });
});
