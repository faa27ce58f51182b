// 64-bit screening fingerprint, held as a bigint in [0, 2^64).
//
//   Bits 0-54:  fragment threshold flags, library order
//   Bits 55-58: heavy-atom bucket (0-15)
//   Bits 59-60: ring bucket (0-3, 3 = three or more)
//   Bit  61:    has stereocenter
//   Bit  62:    has formal charge
//   Bit  63:    reserved, always 0

export type Fingerprint = bigint;

export const FRAGMENT_BIT_COUNT = 55;

export const FRAGMENT_MASK: Fingerprint = (1n << 55n) - 1n;

export const HEAVY_ATOM_SHIFT = 55n;
export const HEAVY_ATOM_MASK: Fingerprint = 0b1111n << HEAVY_ATOM_SHIFT;

export const RING_SHIFT = 59n;
export const RING_MASK: Fingerprint = 0b11n << RING_SHIFT;

export const FLAG_STEREO: Fingerprint = 1n << 61n;
export const FLAG_CHARGE: Fingerprint = 1n << 62n;

export const MAX_FINGERPRINT: Fingerprint = (1n << 64n) - 1n;

// Upper bound (inclusive) of each heavy-atom bucket; larger counts land in bucket 15
const HEAVY_ATOM_BOUNDS: readonly number[] = [5, 10, 15, 20, 25, 30, 35, 40, 50, 60, 75, 90, 110, 140, 180];

export function heavyAtomBucket(count: number): number {
  const bucket = HEAVY_ATOM_BOUNDS.findIndex(bound => count <= bound);
  return bucket === -1 ? HEAVY_ATOM_BOUNDS.length : bucket;
}

export function ringCountBucket(count: number): number {
  return count >= 3 ? 3 : count;
}

export function isFingerprint(value: bigint): boolean {
  return value >= 0n && value <= MAX_FINGERPRINT;
}

export interface FingerprintFields {
  fragmentBits: Fingerprint;
  heavyAtomBucket: number;
  ringBucket: number;
  hasStereocenter: boolean;
  hasFormalCharge: boolean;
}

export function getHeavyAtomBucket(fp: Fingerprint): number {
  return Number((fp & HEAVY_ATOM_MASK) >> HEAVY_ATOM_SHIFT);
}

export function getRingBucket(fp: Fingerprint): number {
  return Number((fp & RING_MASK) >> RING_SHIFT);
}

export function hasStereoFlag(fp: Fingerprint): boolean {
  return (fp & FLAG_STEREO) !== 0n;
}

export function hasChargeFlag(fp: Fingerprint): boolean {
  return (fp & FLAG_CHARGE) !== 0n;
}

export function decodeFingerprint(fp: Fingerprint): FingerprintFields {
  return {
    fragmentBits: fp & FRAGMENT_MASK,
    heavyAtomBucket: getHeavyAtomBucket(fp),
    ringBucket: getRingBucket(fp),
    hasStereocenter: hasStereoFlag(fp),
    hasFormalCharge: hasChargeFlag(fp),
  };
}

/**
 * Inverse of decodeFingerprint. Out-of-range fields are masked to their width.
 */
export function composeFingerprint(fields: FingerprintFields): Fingerprint {
  let fp = fields.fragmentBits & FRAGMENT_MASK;
  fp |= (BigInt(fields.heavyAtomBucket) << HEAVY_ATOM_SHIFT) & HEAVY_ATOM_MASK;
  fp |= (BigInt(fields.ringBucket) << RING_SHIFT) & RING_MASK;
  if (fields.hasStereocenter) fp |= FLAG_STEREO;
  if (fields.hasFormalCharge) fp |= FLAG_CHARGE;
  return fp;
}

export function formatFingerprint(fp: Fingerprint): string {
  return fp.toString(16).padStart(16, '0');
}
