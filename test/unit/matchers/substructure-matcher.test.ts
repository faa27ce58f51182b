import { describe, it, expect } from 'vitest';
import { parseMolecule } from 'src/parser';
import {
  countSubstructureMatches,
  findSubstructureMatches,
  hasSubstructureMatch,
  permutationParity,
} from 'src/matchers/substructure-matcher';

const mol = (smiles: string) => parseMolecule(smiles);

describe('substructure matcher', () => {
  describe('counting', () => {
    it('counts single atom matches', () => {
      expect(countSubstructureMatches(mol('CCO'), mol('C'))).toBe(2);
      expect(countSubstructureMatches(mol('CCO'), mol('O'))).toBe(1);
      expect(countSubstructureMatches(mol('CCO'), mol('N'))).toBe(0);
    });

    it('collapses matches over the same atoms unless asked not to', () => {
      expect(countSubstructureMatches(mol('CCC'), mol('CC'))).toBe(2);
      expect(countSubstructureMatches(mol('CCC'), mol('CC'), { uniqueMatches: false })).toBe(4);
    });

    it('stops at maxMatches', () => {
      expect(countSubstructureMatches(mol('CCCCCC'), mol('C'), { maxMatches: 3 })).toBe(3);
      expect(countSubstructureMatches(mol('CCC'), mol('CC'), { maxMatches: 0 })).toBe(0);
    });

    it('finds both rings of naphthalene', () => {
      expect(countSubstructureMatches(mol('c1ccc2ccccc2c1'), mol('c1ccccc1'))).toBe(2);
    });

    it('returns the mapping in query atom order', () => {
      expect(findSubstructureMatches(mol('CCO'), mol('OC'))).toEqual([[2, 1]]);
    });

    it('matches disconnected queries', () => {
      expect(countSubstructureMatches(mol('CCO'), mol('C.O'))).toBe(2);
    });

    it('gives nothing for a query larger than the target', () => {
      expect(findSubstructureMatches(mol('CC'), mol('CCC'))).toEqual([]);
    });
  });

  describe('atoms and bonds', () => {
    it('lets the wildcard match any atom', () => {
      expect(countSubstructureMatches(mol('CCO'), mol('*O'))).toBe(1);
      expect(countSubstructureMatches(mol('CCO'), mol('**'))).toBe(2);
    });

    it('checks charge only on charged query atoms', () => {
      expect(hasSubstructureMatch(mol('CC(=O)O'), mol('[O-]'))).toBe(false);
      expect(hasSubstructureMatch(mol('CC(=O)[O-]'), mol('[O-]'))).toBe(true);
      expect(countSubstructureMatches(mol('CC(=O)[O-]'), mol('O'))).toBe(2);
    });

    it('checks isotope only on labelled query atoms', () => {
      expect(hasSubstructureMatch(mol('CC'), mol('[13C]'))).toBe(false);
      expect(hasSubstructureMatch(mol('[13CH3]C'), mol('[13C]'))).toBe(true);
    });

    it('keeps aromatic and aliphatic bonds apart', () => {
      expect(hasSubstructureMatch(mol('c1ccccc1'), mol('CC'))).toBe(false);
      expect(countSubstructureMatches(mol('c1ccccc1'), parseMolecule('cc', { sanitize: false }))).toBe(6);
      expect(hasSubstructureMatch(mol('C1=CC=CC=C1'), mol('c1ccccc1'))).toBe(true);
    });

    it('respects bond order', () => {
      expect(hasSubstructureMatch(mol('CC=O'), mol('C=O'))).toBe(true);
      expect(hasSubstructureMatch(mol('CCO'), mol('C=O'))).toBe(false);
    });
  });

  describe('chirality', () => {
    const target = mol('C[C@H](N)O');

    it('ignores tags by default', () => {
      expect(hasSubstructureMatch(target, mol('C[C@@H](N)O'))).toBe(true);
    });

    it('requires the same configuration when asked', () => {
      expect(hasSubstructureMatch(target, mol('C[C@H](N)O'), { useChirality: true })).toBe(true);
      expect(hasSubstructureMatch(target, mol('C[C@@H](N)O'), { useChirality: true })).toBe(false);
    });

    it('compares configurations written in a different neighbour order', () => {
      expect(hasSubstructureMatch(target, mol('N[C@@H](C)O'), { useChirality: true })).toBe(true);
      expect(hasSubstructureMatch(target, mol('N[C@H](C)O'), { useChirality: true })).toBe(false);
    });

    it('lets an unspecified query centre match either configuration', () => {
      expect(hasSubstructureMatch(target, mol('CC(N)O'), { useChirality: true })).toBe(true);
    });

    it('does not let a specified query centre match an unspecified one', () => {
      expect(hasSubstructureMatch(mol('CC(N)O'), target, { useChirality: true })).toBe(false);
    });
  });

  describe('permutationParity', () => {
    it('is even for the identity and for three-cycles', () => {
      expect(permutationParity([1, 2, 3], [1, 2, 3])).toBe(0);
      expect(permutationParity([1, 2, 3], [2, 3, 1])).toBe(0);
    });

    it('is odd for a single swap', () => {
      expect(permutationParity([1, 2, 3], [2, 1, 3])).toBe(1);
      expect(permutationParity([0, -1, 2, 3], [2, -1, 0, 3])).toBe(1);
    });

    it('is null when the items differ', () => {
      expect(permutationParity([1, 2], [1, 3])).toBeNull();
    });
  });
});
