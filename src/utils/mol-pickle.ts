import type { Atom, Bond, Molecule } from 'types';
import { BondType, StereoType } from 'types';
import { ATOM_FIELD_LIMITS, ELEMENT_SYMBOLS, fitsAtomField } from 'src/constants';
import type { LimitedAtomField } from 'src/constants';
import { UnparsablePayloadError } from 'src/errors';
import { enrichMolecule } from './molecule-enrichment';

// Binary molecule layout, all integers little-endian:
//   "MOLB" | version u8 | atomCount u32 | bondCount u32 | atoms... | bonds...
//   atom: atomicNumber u8 | flags u8 | charge i8 | hydrogens u8 | isotope u16
//         | atomClass u32 | neighbourCount u8 | neighbours i32...
//   bond: atom1 u32 | atom2 u32 | type u8 | stereo u8

const MAGIC = new Uint8Array([0x4d, 0x4f, 0x4c, 0x42]); // MOLB
export const PICKLE_VERSION = 1;
const HEADER_SIZE = MAGIC.length + 1 + 4 + 4;
const ATOM_FIXED_SIZE = 11;
const BOND_SIZE = 10;

const FLAG_AROMATIC = 0b0001;
const FLAG_BRACKET = 0b0010;
const FLAG_ISOTOPE = 0b0100;
const CHIRAL_SHIFT = 3;

const BOND_TYPE_CODES: readonly BondType[] = [
  BondType.SINGLE,
  BondType.DOUBLE,
  BondType.TRIPLE,
  BondType.QUADRUPLE,
  BondType.AROMATIC,
];
const STEREO_CODES: readonly StereoType[] = [StereoType.NONE, StereoType.UP, StereoType.DOWN];
const CHIRAL_CODES: readonly Atom['chiral'][] = [null, '@', '@@'];

/**
 * Encode a molecule as a payload.
 * Throws RangeError when a field does not fit its slot; nothing is truncated.
 */
export function pickleMolecule(mol: Molecule): Uint8Array {
  for (const atom of mol.atoms) checkAtomFields(atom);

  const size = HEADER_SIZE
    + mol.atoms.reduce((sum, a) => sum + ATOM_FIXED_SIZE + 4 * (a.chiralNeighbors?.length ?? 0), 0)
    + BOND_SIZE * mol.bonds.length;
  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);

  bytes.set(MAGIC, 0);
  let offset = MAGIC.length;
  view.setUint8(offset, PICKLE_VERSION); offset += 1;
  view.setUint32(offset, mol.atoms.length, true); offset += 4;
  view.setUint32(offset, mol.bonds.length, true); offset += 4;

  for (const atom of mol.atoms) {
    const neighbors = atom.chiralNeighbors ?? [];
    let flags = 0;
    if (atom.aromatic) flags |= FLAG_AROMATIC;
    if (atom.isBracket) flags |= FLAG_BRACKET;
    if (atom.isotope !== null) flags |= FLAG_ISOTOPE;
    flags |= CHIRAL_CODES.indexOf(atom.chiral) << CHIRAL_SHIFT;

    view.setUint8(offset, atom.atomicNumber); offset += 1;
    view.setUint8(offset, flags); offset += 1;
    view.setInt8(offset, atom.charge); offset += 1;
    view.setUint8(offset, atom.hydrogens); offset += 1;
    view.setUint16(offset, atom.isotope ?? 0, true); offset += 2;
    view.setUint32(offset, atom.atomClass, true); offset += 4;
    view.setUint8(offset, neighbors.length); offset += 1;
    for (const neighbor of neighbors) {
      view.setInt32(offset, neighbor, true); offset += 4;
    }
  }

  for (const bond of mol.bonds) {
    view.setUint32(offset, bond.atom1, true); offset += 4;
    view.setUint32(offset, bond.atom2, true); offset += 4;
    view.setUint8(offset, BOND_TYPE_CODES.indexOf(bond.type)); offset += 1;
    view.setUint8(offset, STEREO_CODES.indexOf(bond.stereo)); offset += 1;
  }

  return bytes;
}

const MAX_CHIRAL_NEIGHBORS = 0xff;

function checkAtomFields(atom: Atom): void {
  const fields: [LimitedAtomField, number][] = [
    ['charge', atom.charge],
    ['hydrogens', atom.hydrogens],
    ['isotope', atom.isotope ?? 0],
    ['atomClass', atom.atomClass],
  ];
  for (const [field, value] of fields) {
    if (!fitsAtomField(field, value)) {
      const { min, max } = ATOM_FIELD_LIMITS[field];
      throw new RangeError(`Atom ${atom.id} ${field} ${value} is outside ${min}..${max}`);
    }
  }
  if ((atom.chiralNeighbors?.length ?? 0) > MAX_CHIRAL_NEIGHBORS) {
    throw new RangeError(`Atom ${atom.id} lists more than ${MAX_CHIRAL_NEIGHBORS} stereo neighbours`);
  }
}

class PayloadReader {
  private readonly view: DataView;
  offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private claim(width: number): number {
    const at = this.offset;
    if (at + width > this.bytes.byteLength) {
      throw new UnparsablePayloadError('Molecule payload ends unexpectedly', {
        size: this.bytes.byteLength,
        offset: at,
      });
    }
    this.offset += width;
    return at;
  }

  u8(): number { return this.view.getUint8(this.claim(1)); }
  i8(): number { return this.view.getInt8(this.claim(1)); }
  u16(): number { return this.view.getUint16(this.claim(2), true); }
  u32(): number { return this.view.getUint32(this.claim(4), true); }
  i32(): number { return this.view.getInt32(this.claim(4), true); }

  fail(message: string): never {
    throw new UnparsablePayloadError(message, { size: this.bytes.byteLength, offset: this.offset });
  }
}

/**
 * Decode a payload written by pickleMolecule.
 * Throws UnparsablePayloadError for anything that is not a well-formed payload.
 */
export function unpickleMolecule(bytes: Uint8Array): Molecule {
  const reader = new PayloadReader(bytes);

  for (const expected of MAGIC) {
    if (reader.u8() !== expected) reader.fail('Molecule payload has no MOLB header');
  }
  const version = reader.u8();
  if (version !== PICKLE_VERSION) {
    reader.fail(`Unsupported molecule payload version ${version}`);
  }

  const atomCount = reader.u32();
  const bondCount = reader.u32();
  const minimumSize = HEADER_SIZE + atomCount * ATOM_FIXED_SIZE + bondCount * BOND_SIZE;
  if (minimumSize > bytes.byteLength) {
    reader.fail(`Molecule payload declares ${atomCount} atoms and ${bondCount} bonds but holds ${bytes.byteLength} bytes`);
  }

  const atoms: Atom[] = [];
  for (let id = 0; id < atomCount; id++) {
    atoms.push(readAtom(reader, id));
  }

  const bonds: Bond[] = [];
  for (let i = 0; i < bondCount; i++) {
    bonds.push(readBond(reader, atomCount));
  }

  if (reader.offset !== bytes.byteLength) {
    reader.fail('Trailing bytes after molecule payload');
  }

  for (const atom of atoms) {
    for (const neighbor of atom.chiralNeighbors ?? []) {
      if (neighbor >= atomCount || neighbor < -1) reader.fail(`Atom ${atom.id} lists unknown neighbour ${neighbor}`);
    }
  }

  const molecule: Molecule = { atoms, bonds };
  enrichMolecule(molecule);
  return molecule;
}

function readAtom(reader: PayloadReader, id: number): Atom {
  const atomicNumber = reader.u8();
  const flags = reader.u8();
  const charge = reader.i8();
  const hydrogens = reader.u8();
  const isotope = reader.u16();
  const atomClass = reader.u32();
  const neighborCount = reader.u8();

  const symbol = atomicNumber === 0 ? '*' : ELEMENT_SYMBOLS[atomicNumber - 1];
  if (symbol === undefined) reader.fail(`Unknown atomic number ${atomicNumber}`);

  const chiralCode = flags >> CHIRAL_SHIFT;
  if (chiralCode >= CHIRAL_CODES.length) reader.fail(`Unknown chirality code ${chiralCode}`);
  const chiral = CHIRAL_CODES[chiralCode] ?? null;

  const chiralNeighbors: number[] = [];
  for (let i = 0; i < neighborCount; i++) {
    chiralNeighbors.push(reader.i32());
  }

  const atom: Atom = {
    id,
    symbol,
    atomicNumber,
    charge,
    hydrogens,
    isotope: flags & FLAG_ISOTOPE ? isotope : null,
    aromatic: (flags & FLAG_AROMATIC) !== 0,
    chiral,
    isBracket: (flags & FLAG_BRACKET) !== 0,
    atomClass,
  };
  if (neighborCount > 0) atom.chiralNeighbors = chiralNeighbors;
  return atom;
}

function readBond(reader: PayloadReader, atomCount: number): Bond {
  const atom1 = reader.u32();
  const atom2 = reader.u32();
  const typeCode = reader.u8();
  const stereoCode = reader.u8();

  if (atom1 >= atomCount || atom2 >= atomCount || atom1 === atom2) {
    reader.fail(`Bond ${atom1}-${atom2} does not join two distinct atoms`);
  }
  const type = BOND_TYPE_CODES[typeCode];
  const stereo = STEREO_CODES[stereoCode];
  if (type === undefined || stereo === undefined) {
    reader.fail(`Unknown bond code ${typeCode}/${stereoCode}`);
  }
  return { atom1, atom2, type, stereo };
}
