import { describe, it, expect } from 'vitest';
import { parseMolecule } from 'src/parser';
import { pickleMolecule, unpickleMolecule, PICKLE_VERSION } from 'src/utils/mol-pickle';
import { generateCanonicalSMILES } from 'src/generators/smiles-generator';
import { UnparsablePayloadError } from 'src/errors';
import { createDefaultEngine } from 'src/screening/engine';
import type { Atom, Molecule } from 'types';

function expectUnparsable(bytes: Uint8Array, message: string, context: { size: number; offset: number }) {
  try {
    unpickleMolecule(bytes);
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(UnparsablePayloadError);
    if (error instanceof UnparsablePayloadError) {
      expect(error.message).toBe(message);
      expect(error.context).toEqual(context);
    }
  }
}

describe('molecule payload codec', () => {
  it('writes a MOLB header', () => {
    const bytes = pickleMolecule(parseMolecule('C'));
    expect(bytes.byteLength).toBe(24);
    expect([...bytes.subarray(0, 5)]).toEqual([0x4d, 0x4f, 0x4c, 0x42, PICKLE_VERSION]);
  });

  it('restores atoms, bonds and stereo neighbour order', () => {
    const original = parseMolecule('C[C@H](N)O');
    const restored = unpickleMolecule(pickleMolecule(original));

    expect(restored.atoms.map(a => a.symbol)).toEqual(['C', 'C', 'N', 'O']);
    expect(restored.atoms[1]?.chiral).toBe('@');
    expect(restored.atoms[1]?.chiralNeighbors).toEqual([0, -1, 2, 3]);
    expect(restored.bonds).toHaveLength(3);
    expect(generateCanonicalSMILES(restored, { useStereo: true })).toBe('C[C@H](N)O');
  });

  it('restores charge, isotope, class and aromaticity', () => {
    const restored = unpickleMolecule(pickleMolecule(parseMolecule('[13CH3:2]c1cccc[n+]1[O-]')));
    expect(restored.atoms[0]).toMatchObject({ isotope: 13, atomClass: 2, hydrogens: 3, isBracket: true });
    expect(restored.atoms[6]).toMatchObject({ symbol: 'N', aromatic: true, charge: 1 });
    expect(restored.atoms[7]).toMatchObject({ symbol: 'O', charge: -1 });
    expect(restored.rings).toHaveLength(1);
  });

  it('decodes from a view into a larger buffer', () => {
    const payload = pickleMolecule(parseMolecule('CCO'));
    const framed = new Uint8Array(payload.byteLength + 8);
    framed.set(payload, 8);
    expect(unpickleMolecule(framed.subarray(8)).atoms).toHaveLength(3);
  });

  it('keeps the widest field values through a round trip', () => {
    const restored = unpickleMolecule(pickleMolecule(parseMolecule('[65535CH255+127:4294967295].[C-128]')));
    expect(restored.atoms[0]).toMatchObject({ isotope: 65535, hydrogens: 255, charge: 127, atomClass: 4294967295 });
    expect(restored.atoms[1]?.charge).toBe(-128);
  });

  it('rebuilds the same fingerprint for a charged record', () => {
    const engine = createDefaultEngine();
    const record = engine.recordFromSMILES('[C+127]');
    expect(engine.payloadToRecord(record.payload).fingerprint).toBe(record.fingerprint);
  });

  describe('refuses to write fields wider than their slot', () => {
    const carbon = (overrides: Partial<Atom>): Molecule => ({
      atoms: [{
        id: 0,
        symbol: 'C',
        atomicNumber: 6,
        charge: 0,
        hydrogens: 0,
        isotope: null,
        aromatic: false,
        chiral: null,
        isBracket: true,
        atomClass: 0,
        ...overrides,
      }],
      bonds: [],
    });

    it.each([
      ['charge 256', { charge: 256 }, 'Atom 0 charge 256 is outside -128..127'],
      ['charge 128', { charge: 128 }, 'Atom 0 charge 128 is outside -128..127'],
      ['hydrogens 256', { hydrogens: 256 }, 'Atom 0 hydrogens 256 is outside 0..255'],
      ['isotope 70000', { isotope: 70000 }, 'Atom 0 isotope 70000 is outside 0..65535'],
      ['atom class 5000000000', { atomClass: 5000000000 }, 'Atom 0 atomClass 5000000000 is outside 0..4294967295'],
    ])('%s', (_label, overrides: Partial<Atom>, message) => {
      expect(() => pickleMolecule(carbon(overrides))).toThrow(new RangeError(message));
    });
  });

  describe('rejects', () => {
    it('an empty payload', () => {
      expectUnparsable(new Uint8Array(0), 'Molecule payload ends unexpectedly', { size: 0, offset: 0 });
    });

    it('a foreign header', () => {
      const bytes = pickleMolecule(parseMolecule('C'));
      bytes[3] = 0x43;
      expectUnparsable(bytes, 'Molecule payload has no MOLB header', { size: 24, offset: 4 });
    });

    it('an unknown version', () => {
      const bytes = pickleMolecule(parseMolecule('C'));
      bytes[4] = 2;
      expectUnparsable(bytes, 'Unsupported molecule payload version 2', { size: 24, offset: 5 });
    });

    it('a truncated payload', () => {
      const bytes = pickleMolecule(parseMolecule('CCO')).subarray(0, 20);
      expectUnparsable(bytes, 'Molecule payload declares 3 atoms and 2 bonds but holds 20 bytes', {
        size: 20,
        offset: 13,
      });
    });

    it('trailing bytes', () => {
      const payload = pickleMolecule(parseMolecule('C'));
      const padded = new Uint8Array(payload.byteLength + 1);
      padded.set(payload);
      expectUnparsable(padded, 'Trailing bytes after molecule payload', { size: 25, offset: 24 });
    });
  });
});
