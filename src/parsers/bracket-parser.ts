import type { Atom } from 'types';
import { ATOMIC_NUMBERS, fitsAtomField } from 'src/constants';
import { isAromaticOrganicSymbol } from 'src/utils/atom-utils';

/**
 * Parse bracket atom notation like [C], [NH4+], [13CH3@TH1:2], [nH]
 * Returns null when the content is not a valid bracket atom.
 */
export function parseBracketAtom(content: string, id: number): Atom | null {
  let isotope: number | null = null;
  let hydrogens = 0;
  let charge = 0;
  let chiral: Atom['chiral'] = null;
  let atomClass = 0;

  let j = 0;
  const readNumber = (): string => {
    let digits = '';
    while (j < content.length && /[0-9]/.test(content.charAt(j))) {
      digits += content.charAt(j);
      j++;
    }
    return digits;
  };

  // isotope
  const isoStr = readNumber();
  if (isoStr !== '') {
    isotope = parseInt(isoStr, 10);
  }

  // symbol (including wildcard *)
  const symbolResult = readSymbol(content, j);
  if (!symbolResult) {
    return null;
  }
  const { symbol, aromatic } = symbolResult;
  j = symbolResult.end;

  // chirality
  if (content.charAt(j) === '@') {
    j++;
    if (content.charAt(j) === '@') {
      chiral = '@@';
      j++;
    } else if (content.startsWith('TH', j)) {
      const cls = content.charAt(j + 2);
      if (cls !== '1' && cls !== '2') return null;
      chiral = cls === '1' ? '@' : '@@';
      j += 3;
    } else if (/^(AL|SP|TB|OH)/.test(content.slice(j))) {
      // non-tetrahedral classes are accepted but carry no tag
      j += 2;
      readNumber();
    } else {
      chiral = '@';
    }
  }

  // hydrogen count
  if (content.charAt(j) === 'H') {
    j++;
    const hStr = readNumber();
    hydrogens = hStr === '' ? 1 : parseInt(hStr, 10);
  }

  // charge
  const sign = content.charAt(j);
  if (sign === '+' || sign === '-') {
    const direction = sign === '+' ? 1 : -1;
    let count = 0;
    while (content.charAt(j) === sign) {
      count++;
      j++;
    }
    const magnitude = readNumber();
    if (magnitude !== '') {
      if (count > 1) return null;
      charge = direction * parseInt(magnitude, 10);
    } else {
      charge = direction * count;
    }
  }

  // atom class
  if (content.charAt(j) === ':') {
    j++;
    const classStr = readNumber();
    if (classStr === '') return null;
    atomClass = parseInt(classStr, 10);
  }

  if (j !== content.length) {
    return null;
  }

  if (
    !fitsAtomField('charge', charge)
    || !fitsAtomField('hydrogens', hydrogens)
    || !fitsAtomField('isotope', isotope ?? 0)
    || !fitsAtomField('atomClass', atomClass)
  ) {
    return null;
  }

  return {
    id,
    symbol: symbol.symbol,
    atomicNumber: symbol.atomicNumber,
    charge,
    hydrogens,
    isotope,
    aromatic,
    chiral,
    isBracket: true,
    atomClass,
  };
}

interface SymbolRead {
  symbol: { symbol: string; atomicNumber: number };
  aromatic: boolean;
  end: number;
}

function readSymbol(content: string, start: number): SymbolRead | null {
  const first = content.charAt(start);
  if (first === '*') {
    return { symbol: { symbol: '*', atomicNumber: 0 }, aromatic: false, end: start + 1 };
  }

  // aromatic symbols: two-letter forms first
  const twoLower = content.slice(start, start + 2);
  if (isAromaticOrganicSymbol(twoLower) && twoLower.length === 2) {
    return aromaticSymbol(twoLower, start + 2);
  }
  if (/[a-z]/.test(first)) {
    return isAromaticOrganicSymbol(first) ? aromaticSymbol(first, start + 1) : null;
  }

  if (!/[A-Z]/.test(first)) {
    return null;
  }
  const second = content.charAt(start + 1);
  if (/[a-z]/.test(second)) {
    const twoLetter = first + second;
    const atomicNumber = ATOMIC_NUMBERS[twoLetter];
    if (atomicNumber !== undefined) {
      return { symbol: { symbol: twoLetter, atomicNumber }, aromatic: false, end: start + 2 };
    }
  }
  const atomicNumber = ATOMIC_NUMBERS[first];
  if (atomicNumber === undefined) {
    return null;
  }
  return { symbol: { symbol: first, atomicNumber }, aromatic: false, end: start + 1 };
}

function aromaticSymbol(lower: string, end: number): SymbolRead | null {
  const symbol = lower.charAt(0).toUpperCase() + lower.slice(1);
  const atomicNumber = ATOMIC_NUMBERS[symbol];
  if (atomicNumber === undefined) {
    return null;
  }
  return { symbol: { symbol, atomicNumber }, aromatic: true, end };
}
