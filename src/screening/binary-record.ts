import type { Fingerprint } from './fingerprint';
import { isFingerprint } from './fingerprint';
import { CorruptRecordError } from 'src/errors';

// Record layout:
//   offset 0..8 : fingerprint, u64 little-endian
//   offset 8..N : molecule payload

export const FINGERPRINT_BYTES = 8;
export const PREFIX_BYTES = 4;

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function checkLength(bytes: Uint8Array): void {
  if (bytes.byteLength < FINGERPRINT_BYTES) {
    throw new CorruptRecordError(bytes.byteLength);
  }
}

export function assemble(fingerprint: Fingerprint, payload: Uint8Array): Uint8Array {
  if (!isFingerprint(fingerprint)) {
    throw new RangeError(`Fingerprint ${fingerprint} is outside the unsigned 64-bit range`);
  }
  const bytes = new Uint8Array(FINGERPRINT_BYTES + payload.byteLength);
  viewOf(bytes).setBigUint64(0, fingerprint, true);
  bytes.set(payload, FINGERPRINT_BYTES);
  return bytes;
}

export function getFingerprint(bytes: Uint8Array): Fingerprint {
  checkLength(bytes);
  return viewOf(bytes).getBigUint64(0, true);
}

/** Copy of the payload bytes. */
export function getPayload(bytes: Uint8Array): Uint8Array {
  checkLength(bytes);
  return bytes.slice(FINGERPRINT_BYTES);
}

export function getPayloadSize(bytes: Uint8Array): number {
  checkLength(bytes);
  return bytes.byteLength - FINGERPRINT_BYTES;
}

/** First four fingerprint bytes, i.e. fragment bits 0-31. */
export function getPrefixBits(bytes: Uint8Array): number {
  checkLength(bytes);
  return viewOf(bytes).getUint32(0, true);
}

/**
 * Immutable fingerprint-prefixed molecule record. Owns a private copy of
 * its bytes; every accessor hands out copies or values.
 */
export class BinaryRecord {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  static assemble(fingerprint: Fingerprint, payload: Uint8Array): BinaryRecord {
    return new BinaryRecord(assemble(fingerprint, payload));
  }

  /** Wrap stored bytes. Rejects anything shorter than the fingerprint. */
  static from(bytes: Uint8Array): BinaryRecord {
    checkLength(bytes);
    return new BinaryRecord(bytes.slice());
  }

  get fingerprint(): Fingerprint {
    return getFingerprint(this.bytes);
  }

  get payload(): Uint8Array {
    return getPayload(this.bytes);
  }

  get payloadSize(): number {
    return getPayloadSize(this.bytes);
  }

  get prefixBits(): number {
    return getPrefixBits(this.bytes);
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  samePrefix(other: BinaryRecord): boolean {
    return this.prefixBits === other.prefixBits;
  }
}
