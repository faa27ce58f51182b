import type { Molecule } from 'types';
import type { ChemistryToolkit } from './capabilities';
import type { Comparator, ComparatorOptions, MoleculeOperand } from './comparator';
import { createComparator } from './comparator';
import type { Conversions } from './conversions';
import { createConversions } from './conversions';
import type { EncoderOptions, FingerprintEncoder } from './fingerprint-encoder';
import { createFingerprintEncoder } from './fingerprint-encoder';
import type { SearchResult } from './search';
import { searchSubstructure } from './search';
import { mightContain } from './containment-screen';
import { createToolkit } from './molecule-toolkit';

export type EngineOptions = EncoderOptions & ComparatorOptions;

export interface ScreeningEngine<M> extends Comparator, Conversions<M> {
  readonly encoder: FingerprintEncoder<M>;
  encode(molecule: M): bigint;
  mightContain: typeof mightContain;
  search(targets: readonly MoleculeOperand[], query: MoleculeOperand): SearchResult;
}

/**
 * Encoder, comparator, conversions and batch search bound to one toolkit
 * and one fragment library.
 */
export function createScreeningEngine<M, P>(
  toolkit: ChemistryToolkit<M, P>,
  options: EngineOptions = {},
): ScreeningEngine<M> {
  const encoder = createFingerprintEncoder(toolkit, { library: options.library });
  const comparator = createComparator(toolkit, { useStereo: options.useStereo });
  const conversions = createConversions(toolkit, encoder);

  return {
    ...comparator,
    ...conversions,
    encoder,
    encode: molecule => encoder.encode(molecule),
    mightContain,
    search: (targets, query) => searchSubstructure(toolkit, targets, query, { useStereo: options.useStereo }),
  };
}

/** Engine over the bundled SMILES toolkit. */
export function createDefaultEngine(options: EngineOptions = {}): ScreeningEngine<Molecule> {
  return createScreeningEngine(createToolkit(), options);
}
