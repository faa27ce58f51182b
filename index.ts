export { parseSMILES, parseMolecule, isValidSMILES } from 'src/parser';
export type { ParseOptions } from 'src/parser';
export { generateCanonicalSMILES } from 'src/generators/smiles-generator';
export type { SMILESOptions } from 'src/generators/smiles-generator';
export {
  findSubstructureMatches,
  countSubstructureMatches,
  hasSubstructureMatch,
} from 'src/matchers/substructure-matcher';
export type { SubstructureMatchOptions, AtomMapping } from 'src/matchers/substructure-matcher';
export { pickleMolecule, unpickleMolecule, PICKLE_VERSION } from 'src/utils/mol-pickle';
export { findSSSR, countRings } from 'src/utils/ring-finder';
export { enableVerboseLogging, disableVerboseLogging, verboseLoggingStatus } from 'src/utils/verbose';

export {
  ScreeningError,
  CorruptRecordError,
  UnparsablePayloadError,
  FragmentLibraryBuildError,
  MoleculeParseError,
} from 'src/errors';
export type { ScreeningErrorCode, ErrorContext } from 'src/errors';

export type {
  MatchParameters,
  MatchCounter,
  StructureProbe,
  IsomorphismOracle,
  MoleculeCodec,
  ChemistryToolkit,
} from 'src/screening/capabilities';
export {
  DEFAULT_FRAGMENT_LIBRARY,
  defineFragmentLibrary,
  fragmentBitOffsets,
  totalThresholds,
} from 'src/screening/fragment-library';
export type { FragmentLibrary, FragmentPattern, Threshold } from 'src/screening/fragment-library';
export {
  FRAGMENT_BIT_COUNT,
  FRAGMENT_MASK,
  heavyAtomBucket,
  ringCountBucket,
  decodeFingerprint,
  composeFingerprint,
  formatFingerprint,
} from 'src/screening/fingerprint';
export type { Fingerprint, FingerprintFields } from 'src/screening/fingerprint';
export { createFingerprintEncoder, FRAGMENT_MATCH_PARAMETERS } from 'src/screening/fingerprint-encoder';
export type { EncoderOptions, FingerprintEncoder } from 'src/screening/fingerprint-encoder';
export {
  BinaryRecord,
  assemble,
  getFingerprint,
  getPayload,
  getPayloadSize,
  getPrefixBits,
  FINGERPRINT_BYTES,
  PREFIX_BYTES,
} from 'src/screening/binary-record';
export { mightContain, explainScreen } from 'src/screening/containment-screen';
export type { ScreenFailure } from 'src/screening/containment-screen';
export { createComparator } from 'src/screening/comparator';
export type { Comparator, ComparatorOptions, MoleculeOperand } from 'src/screening/comparator';
export { createConversions, splitRecord } from 'src/screening/conversions';
export type { Conversions, RecordColumns } from 'src/screening/conversions';
export { searchSubstructure } from 'src/screening/search';
export type { SearchResult, SearchStats } from 'src/screening/search';
export { createToolkit } from 'src/screening/molecule-toolkit';
export type { MoleculeToolkit } from 'src/screening/molecule-toolkit';
export { createScreeningEngine, createDefaultEngine } from 'src/screening/engine';
export type { ScreeningEngine, EngineOptions } from 'src/screening/engine';

export type { Atom, Bond, Molecule, ParseResult, ParseError } from 'types';
export { BondType, StereoType } from 'types';
