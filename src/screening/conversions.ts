import type { IsomorphismOracle, MoleculeCodec } from './capabilities';
import type { FingerprintEncoder } from './fingerprint-encoder';
import type { Fingerprint } from './fingerprint';
import type { MoleculeOperand } from './comparator';
import { BinaryRecord } from './binary-record';

/** A record split into separately stored columns. */
export interface RecordColumns {
  payload: Uint8Array;
  fingerprint: Fingerprint;
}

export function splitRecord(record: BinaryRecord): RecordColumns {
  return { payload: record.payload, fingerprint: record.fingerprint };
}

export interface Conversions<M> {
  /** Bare molecule payload, no fingerprint. */
  moleculeFromSMILES(text: string): Uint8Array;
  recordFromSMILES(text: string): BinaryRecord;
  recordFromMolecule(molecule: M): BinaryRecord;
  payloadToRecord(payload: Uint8Array): BinaryRecord;
  recordToPayload(record: BinaryRecord): Uint8Array;
  toSMILES(operand: MoleculeOperand, options?: { useStereo?: boolean }): string;
  /** Read from a record's prefix, or computed for a bare payload. */
  fingerprintOf(operand: MoleculeOperand): Fingerprint;
}

export function createConversions<M>(
  toolkit: MoleculeCodec<M> & Pick<IsomorphismOracle<M>, 'canonicalForm'>,
  encoder: FingerprintEncoder<M>,
): Conversions<M> {
  const recordFromMolecule = (molecule: M): BinaryRecord =>
    BinaryRecord.assemble(encoder.encode(molecule), toolkit.serialize(molecule));

  const payloadOf = (operand: MoleculeOperand): Uint8Array =>
    operand instanceof BinaryRecord ? operand.payload : operand;

  return {
    moleculeFromSMILES: text => toolkit.serialize(toolkit.parse(text)),
    recordFromSMILES: text => recordFromMolecule(toolkit.parse(text)),
    recordFromMolecule,
    payloadToRecord: payload => recordFromMolecule(toolkit.deserialize(payload)),
    recordToPayload: record => record.payload,
    toSMILES: (operand, options = {}) =>
      toolkit.canonicalForm(toolkit.deserialize(payloadOf(operand)), options.useStereo ?? false),
    fingerprintOf: operand =>
      operand instanceof BinaryRecord ? operand.fingerprint : encoder.encode(toolkit.deserialize(operand)),
  };
}
