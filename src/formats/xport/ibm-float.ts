/**
 * IBM System/360 hexadecimal floating point
 *
 * SAS transport files store numerics as big-endian IBM floats: one byte of
 * sign and excess-64 base-16 exponent, then up to seven bytes of fraction.
 * Variables shorter than 8 bytes keep the leading bytes only.
 *
 * @module formats/xport/ibm-float
 */

/**
 * `.`, `._` and `.A`-`.Z` missing codes: the marker byte, then zeros
 */
export function isMissingNumeric(bytes: Uint8Array, offset: number, length: number): boolean {
  const marker = bytes[offset];
  const isMarker = marker === 0x2e || marker === 0x5f || (marker >= 0x41 && marker <= 0x5a);
  if (!isMarker) {
    return false;
  }

  for (let i = 1; i < length; i++) {
    if (bytes[offset + i] !== 0) {
      return false;
    }
  }
  return true;
}

/**
 * Decode an IBM float of 2-8 bytes; missing values decode to null
 *
 * @throws {RangeError} If length is outside 2..8 or the value runs past the buffer
 */
export function decodeIbmFloat(bytes: Uint8Array, offset = 0, length = 8): number | null {
  if (length < 2 || length > 8) {
    throw new RangeError(`IBM float length must be between 2 and 8 bytes, got ${length}`);
  }
  if (offset < 0 || offset + length > bytes.length) {
    throw new RangeError(`IBM float at ${offset} (length ${length}) exceeds buffer of ${bytes.length} bytes`);
  }

  if (isMissingNumeric(bytes, offset, length)) {
    return null;
  }

  const head = bytes[offset];
  let fraction = 0;
  for (let i = 1; i < 8; i++) {
    fraction = fraction * 256 + (i < length ? bytes[offset + i] : 0);
  }

  if (fraction === 0) {
    return 0;
  }

  const sign = head & 0x80 ? -1 : 1;
  const exponent = (head & 0x7f) - 64;

  // value = 0.fraction (base 16) * 16^exponent, fraction held as a 56-bit integer
  return sign * fraction * Math.pow(2, 4 * exponent - 56);
}
