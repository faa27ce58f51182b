import { describe, it, expect } from 'vitest';
import { parseMolecule } from 'src/parser';
import { countConnectedComponents, countRings, findSSSR } from 'src/utils/ring-finder';

describe('ring finder', () => {
  it('finds nothing in a chain', () => {
    const { atoms, bonds } = parseMolecule('CCCC');
    expect(findSSSR(atoms, bonds)).toEqual([]);
    expect(countRings(atoms, bonds)).toBe(0);
  });

  it('finds the two rings of naphthalene', () => {
    const { atoms, bonds } = parseMolecule('c1ccc2ccccc2c1');
    const rings = findSSSR(atoms, bonds);
    expect(rings.map(r => r.length)).toEqual([6, 6]);
    expect(countRings(atoms, bonds)).toBe(2);
  });

  it('finds five four-membered rings in cubane', () => {
    const { atoms, bonds } = parseMolecule('C12C3C4C1C5C2C3C45');
    const rings = findSSSR(atoms, bonds);
    expect(rings).toHaveLength(5);
    expect(rings.every(r => r.length === 4)).toBe(true);
  });

  it('counts rings per component', () => {
    const { atoms, bonds } = parseMolecule('C1CC1.C1CC1');
    expect(countConnectedComponents(atoms, bonds)).toBe(2);
    expect(countRings(atoms, bonds)).toBe(2);
  });

  it('marks ring membership on atoms and bonds', () => {
    const molecule = parseMolecule('CC1CC1');
    expect(molecule.atoms.map(a => a.isInRing)).toEqual([false, true, true, true]);
    expect(molecule.bonds.map(b => b.isInRing)).toEqual([false, true, true, true]);
  });
});
