import elementData from './data/elements.json';

export const ELEMENT_SYMBOLS: readonly string[] = elementData.symbols;

export const ATOMIC_NUMBERS: Readonly<Record<string, number>> = Object.fromEntries(
  elementData.symbols.map((symbol, index) => [symbol, index + 1]),
);

// Atoms that may be written without brackets
export const ORGANIC_SUBSET: ReadonlySet<string> = new Set(elementData.organicSubset);

export const DEFAULT_VALENCES: Readonly<Record<string, readonly number[]>> = elementData.defaultValences;

// Aromatic bonds count as 1 when these are applied
export const AROMATIC_VALENCES: Readonly<Record<string, readonly number[]>> = elementData.aromaticValences;

// Widest values an atom field may hold; the molecule payload stores them in fixed-width slots
export const ATOM_FIELD_LIMITS = {
  charge: { min: -128, max: 127 },
  hydrogens: { min: 0, max: 0xff },
  isotope: { min: 0, max: 0xffff },
  atomClass: { min: 0, max: 0xffffffff },
} as const;

export type LimitedAtomField = keyof typeof ATOM_FIELD_LIMITS;

export function fitsAtomField(field: LimitedAtomField, value: number): boolean {
  const { min, max } = ATOM_FIELD_LIMITS[field];
  return Number.isInteger(value) && value >= min && value <= max;
}
