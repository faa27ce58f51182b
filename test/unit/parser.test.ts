import { describe, it, expect } from 'vitest';
import { parseSMILES, parseMolecule, isValidSMILES } from 'src/parser';
import { BondType, StereoType, IMPLICIT_HYDROGEN } from 'types';
import { MoleculeParseError } from 'src/errors';

describe('SMILES parser', () => {
  describe('organic subset atoms', () => {
    it('parses ethanol with implicit hydrogens', () => {
      const { molecule, errors } = parseSMILES('CCO');
      expect(errors).toHaveLength(0);
      expect(molecule.atoms.map(a => a.symbol)).toEqual(['C', 'C', 'O']);
      expect(molecule.atoms.map(a => a.hydrogens)).toEqual([3, 2, 1]);
      expect(molecule.bonds).toHaveLength(2);
    });

    it('reads Cl and Br as single atoms', () => {
      const { molecule } = parseSMILES('ClCBr');
      expect(molecule.atoms.map(a => a.symbol)).toEqual(['Cl', 'C', 'Br']);
      expect(molecule.atoms.map(a => a.atomicNumber)).toEqual([17, 6, 35]);
      expect(molecule.atoms[1]?.hydrogens).toBe(2);
    });

    it('uses the next default valence for sulfur', () => {
      const { molecule } = parseSMILES('CS(=O)(=O)C');
      expect(molecule.atoms[1]?.hydrogens).toBe(0);
      expect(parseSMILES('CS').molecule.atoms[1]?.hydrogens).toBe(1);
    });

    it('parses the wildcard', () => {
      const { molecule, errors } = parseSMILES('*C');
      expect(errors).toHaveLength(0);
      expect(molecule.atoms[0]?.atomicNumber).toBe(0);
      expect(molecule.atoms[0]?.hydrogens).toBe(0);
    });
  });

  describe('bracket atoms', () => {
    it('parses charge and explicit hydrogens', () => {
      const atom = parseSMILES('[NH4+]').molecule.atoms[0];
      expect(atom).toMatchObject({ symbol: 'N', charge: 1, hydrogens: 4, isBracket: true });
    });

    it('parses isotopes, multi-charge and atom classes', () => {
      const [a, b] = parseSMILES('[13CH3][Fe+2:5]').molecule.atoms;
      expect(a).toMatchObject({ isotope: 13, hydrogens: 3, charge: 0 });
      expect(b).toMatchObject({ symbol: 'Fe', charge: 2, atomClass: 5, hydrogens: 0 });
    });

    it('parses repeated charge signs', () => {
      expect(parseSMILES('[O--]').molecule.atoms[0]?.charge).toBe(-2);
    });

    it('keeps bracket hydrogens as written', () => {
      const { molecule } = parseSMILES('c1cc[nH]c1');
      expect(molecule.atoms[3]).toMatchObject({ symbol: 'N', aromatic: true, hydrogens: 1 });
    });

    it('accepts values at the edge of the payload field widths', () => {
      const [a, b] = parseSMILES('[65535CH255+127:4294967295].[C-128]').molecule.atoms;
      expect(a).toMatchObject({ isotope: 65535, hydrogens: 255, charge: 127, atomClass: 4294967295 });
      expect(b?.charge).toBe(-128);
    });

    it.each([
      ['[C+256]', 'C+256'],
      ['[C+128]', 'C+128'],
      ['[C-129]', 'C-129'],
      ['[70000C]', '70000C'],
      ['[CH256]', 'CH256'],
      ['[C:5000000000]', 'C:5000000000'],
    ])('rejects %s as out of range', (smiles, content) => {
      expect(parseSMILES(smiles).errors).toEqual([{ message: `Invalid bracket atom: ${content}`, position: 0 }]);
    });

    it('reports an invalid bracket atom', () => {
      const { errors } = parseSMILES('[Xx]');
      expect(errors).toEqual([{ message: 'Invalid bracket atom: Xx', position: 0 }]);
    });
  });

  describe('bonds and rings', () => {
    it('reads explicit bond symbols', () => {
      const { molecule } = parseSMILES('C=C#N');
      expect(molecule.bonds.map(b => b.type)).toEqual([BondType.DOUBLE, BondType.TRIPLE]);
    });

    it('records directional single bonds', () => {
      const { molecule } = parseSMILES('F/C=C\\F');
      expect(molecule.bonds.map(b => b.stereo)).toEqual([StereoType.UP, StereoType.NONE, StereoType.DOWN]);
      expect(molecule.bonds[0]?.type).toBe(BondType.SINGLE);
    });

    it('makes unmarked bonds between aromatic atoms aromatic', () => {
      const { molecule } = parseSMILES('c1ccccc1');
      expect(molecule.bonds).toHaveLength(6);
      expect(molecule.bonds.every(b => b.type === BondType.AROMATIC)).toBe(true);
      expect(molecule.atoms.every(a => a.hydrogens === 1)).toBe(true);
    });

    it('keeps an explicit single bond between aromatic rings', () => {
      const { molecule } = parseSMILES('c1ccccc1-c1ccccc1');
      expect(molecule.bonds.filter(b => b.type === BondType.SINGLE)).toHaveLength(1);
      expect(molecule.rings).toHaveLength(2);
    });

    it('reuses ring closure digits', () => {
      const { molecule, errors } = parseSMILES('C1CC1C1CC1');
      expect(errors).toHaveLength(0);
      expect(molecule.rings).toHaveLength(2);
    });

    it('reads two-digit ring closures', () => {
      const { molecule, errors } = parseSMILES('C%10CCC%10');
      expect(errors).toHaveLength(0);
      expect(molecule.bonds).toHaveLength(4);
      expect(molecule.rings?.[0]).toHaveLength(4);
    });

    it('takes the ring bond type from either end', () => {
      expect(parseSMILES('C=1CCC1').molecule.bonds[3]?.type).toBe(BondType.DOUBLE);
      expect(parseSMILES('C1CCC=1').molecule.bonds[3]?.type).toBe(BondType.DOUBLE);
    });

    it('keeps dot-separated components in one graph', () => {
      const { molecule, errors } = parseSMILES('[Na+].[Cl-]');
      expect(errors).toHaveLength(0);
      expect(molecule.atoms).toHaveLength(2);
      expect(molecule.bonds).toHaveLength(0);
    });

    it('handles nested branches', () => {
      const { molecule } = parseSMILES('CC(C(C)C)O');
      expect(molecule.bonds.map(b => [b.atom1, b.atom2])).toEqual([[0, 1], [1, 2], [2, 3], [2, 4], [1, 5]]);
    });
  });

  describe('chirality', () => {
    it('records neighbour order with the implicit hydrogen after the preceding atom', () => {
      const atom = parseSMILES('C[C@H](N)O').molecule.atoms[1];
      expect(atom?.chiral).toBe('@');
      expect(atom?.chiralNeighbors).toEqual([0, IMPLICIT_HYDROGEN, 2, 3]);
    });

    it('puts the hydrogen first on a leading chiral atom', () => {
      const atom = parseSMILES('[C@@H](C)(N)O').molecule.atoms[0];
      expect(atom?.chiral).toBe('@@');
      expect(atom?.chiralNeighbors).toEqual([IMPLICIT_HYDROGEN, 1, 2, 3]);
    });

    it('keeps ring closure neighbours at their digit position', () => {
      const atom = parseSMILES('N[C@@]1(C)CCC1').molecule.atoms[1];
      expect(atom?.chiralNeighbors).toEqual([0, 5, 2, 3]);
    });

    it('reads @TH1 and @TH2', () => {
      expect(parseSMILES('C[C@TH1H](N)O').molecule.atoms[1]?.chiral).toBe('@');
      expect(parseSMILES('C[C@TH2H](N)O').molecule.atoms[1]?.chiral).toBe('@@');
    });

    it('drops tags on atoms with fewer than three neighbours', () => {
      const atom = parseSMILES('C[C@H]C').molecule.atoms[1];
      expect(atom?.chiral).toBeNull();
      expect(atom?.chiralNeighbors).toBeUndefined();
    });
  });

  describe('errors', () => {
    it('reports an empty string', () => {
      expect(parseSMILES('').errors).toEqual([{ message: 'Empty SMILES', position: 0 }]);
    });

    it('reports an unclosed ring', () => {
      expect(parseSMILES('C1CC').errors).toEqual([{ message: 'Ring closure 1 is never closed', position: 1 }]);
    });

    it('reports a ring closure that repeats an existing bond', () => {
      const chain = parseSMILES('CC1C1');
      expect(chain.errors).toEqual([{ message: 'Ring closure 1 duplicates an existing bond', position: 4 }]);
      expect(chain.molecule.bonds).toHaveLength(2);

      const doubled = parseSMILES('C12CCC12');
      expect(doubled.errors).toEqual([{ message: 'Ring closure 2 duplicates an existing bond', position: 7 }]);
      expect(doubled.molecule.bonds).toHaveLength(4);
      expect(() => parseMolecule('C12CCC12')).toThrow(MoleculeParseError);
    });

    it('reports unbalanced parentheses', () => {
      expect(parseSMILES('C(C').errors).toEqual([{ message: 'Unmatched opening parentheses', position: -1 }]);
      expect(parseSMILES('CC)').errors).toEqual([{ message: 'Unmatched closing parenthesis', position: 2 }]);
    });

    it('reports characters outside the grammar', () => {
      expect(parseSMILES('CXC').errors).toEqual([{ message: 'Unsupported character: X', position: 1 }]);
      expect(parseSMILES('C?').errors).toEqual([{ message: 'Unsupported character: ?', position: 1 }]);
    });

    it('throws from the strict entry point', () => {
      expect(() => parseMolecule('C1CC')).toThrow(MoleculeParseError);
      try {
        parseMolecule('CXC');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MoleculeParseError);
        if (error instanceof MoleculeParseError) {
          expect(error.code).toBe('MOLECULE_PARSE_ERROR');
          expect(error.context?.input).toBe('CXC');
        }
      }
    });

    it('validates without throwing', () => {
      expect(isValidSMILES('CCO')).toBe(true);
      expect(isValidSMILES('C1CC')).toBe(false);
      expect(isValidSMILES('')).toBe(false);
    });
  });

  describe('unsanitized patterns', () => {
    it('keeps aromatic bonds outside rings', () => {
      const pattern = parseMolecule('cnc', { sanitize: false });
      expect(pattern.bonds.map(b => b.type)).toEqual([BondType.AROMATIC, BondType.AROMATIC]);
    });

    it('demotes them when sanitized', () => {
      const { molecule } = parseSMILES('cnc');
      expect(molecule.bonds.map(b => b.type)).toEqual([BondType.SINGLE, BondType.SINGLE]);
    });
  });
});
