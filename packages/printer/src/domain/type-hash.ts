const FNV_OFFSET_BASIS = 0xcb_f2_9c_e4_84_22_23_25n;
const FNV_PRIME = 0x1_00_00_00_01_b3n;

const encoder = new TextEncoder();

/**
 * 64-bit FNV-1a hash of a fully qualified type name. Records and variants carry
 * this hash in their first payload word.
 */
export function typeHash(typeName: string): bigint {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of encoder.encode(typeName)) {
    hash ^= BigInt(byte);
    hash = BigInt.asUintN(64, hash * FNV_PRIME);
  }
  return hash;
}

export function formatTypeHash(hash: bigint): string {
  return `0x${hash.toString(16).padStart(16, '0')}`;
}
