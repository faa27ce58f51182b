import type { Atom } from 'types';
import { ATOMIC_NUMBERS, ORGANIC_SUBSET } from 'src/constants';

/**
 * Check if a symbol belongs to the organic subset (may be written without brackets)
 */
export function isOrganicAtom(symbol: string): boolean {
  return ORGANIC_SUBSET.has(symbol);
}

/**
 * Atoms written in lowercase in SMILES
 */
export function isAromaticOrganicSymbol(symbol: string): boolean {
  return /^(b|c|n|o|p|s|se|as)$/.test(symbol);
}

/**
 * Heavy atoms exclude hydrogen and the wildcard
 */
export function isHeavyAtom(atom: Atom): boolean {
  return atom.atomicNumber > 1;
}

/**
 * Create a new atom with the given properties
 */
export function createAtom(symbol: string, id: number, aromatic = false, isBracket = false, atomClass = 0): Atom | null {
  const normalizedSymbol = symbol === '*'
    ? '*'
    : (symbol[0]?.toUpperCase() ?? '') + symbol.slice(1).toLowerCase();
  const atomicNumber = normalizedSymbol === '*' ? 0 : ATOMIC_NUMBERS[normalizedSymbol];
  if (atomicNumber === undefined) {
    return null;
  }
  return {
    id,
    symbol: normalizedSymbol,
    atomicNumber,
    charge: 0,
    hydrogens: 0,
    isotope: null,
    aromatic,
    chiral: null,
    isBracket,
    atomClass,
  };
}
