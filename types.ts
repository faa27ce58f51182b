// Core types for the molecule graph

export enum BondType {
  SINGLE = 'single',
  DOUBLE = 'double',
  TRIPLE = 'triple',
  QUADRUPLE = 'quadruple',
  AROMATIC = 'aromatic',
}

export enum StereoType {
  NONE = 'none',
  UP = 'up', // /
  DOWN = 'down', // \
}

/** Marks the implicit hydrogen inside `Atom.chiralNeighbors`. */
export const IMPLICIT_HYDROGEN = -1;

/**
 * Atom in a molecule graph. Degree and ring membership are filled in
 * once the graph is complete.
 */
export interface Atom {
  id: number; // index into Molecule.atoms
  symbol: string; // element symbol, e.g. 'C', 'Cl', '*'
  atomicNumber: number; // 0 for the wildcard
  charge: number; // formal charge
  hydrogens: number; // implicit or bracket hydrogens
  isotope: number | null; // isotopic mass, null if unspecified
  aromatic: boolean;
  chiral: '@' | '@@' | null; // tetrahedral tag, relative to chiralNeighbors
  chiralNeighbors?: number[]; // neighbour ids in written order, IMPLICIT_HYDROGEN for the H
  isBracket: boolean; // true if parsed from bracket
  atomClass: number; // atom class for application-specific marking (default 0)
  degree?: number; // explicit neighbour count (pre-computed after enrichment)
  isInRing?: boolean; // true if atom is in any ring (pre-computed after enrichment)
}

/** Bond between two atoms. */
export interface Bond {
  atom1: number; // atom id
  atom2: number; // atom id
  type: BondType;
  stereo: StereoType; // directional marker written on single bonds
  isInRing?: boolean; // true if bond is in any ring (pre-computed after enrichment)
}

/**
 * Disconnected components ('.') live in the same graph.
 * Nothing mutates a molecule once the parser or the codec hands it out.
 */
export interface Molecule {
  atoms: Atom[];
  bonds: Bond[];
  rings?: number[][]; // smallest set of smallest rings (atom ids)
}

export interface ParseError {
  message: string;
  position: number; // character position in SMILES string (0-based), -1 when not tied to one
}

export interface ParseResult {
  molecule: Molecule;
  errors: ParseError[]; // any parsing errors with position info
}
