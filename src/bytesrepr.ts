/**
 * Little-endian, length-prefixed primitives of the network's bytesrepr format
 *
 * Everything that feeds a hash is built from these helpers, so widths and
 * byte order here are part of the protocol.
 */
import { EncodingError } from "./errors.js";
import { concatBytes, stringToBytes } from "./crypto/utils.js";

const U32_MAX = 0xffff_ffff;
const U64_MAX = (1n << 64n) - 1n;
const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

/**
 * Any integer input accepted by the big-number encoders
 */
export type BigNumberish = string | number | bigint;

export function encodeU8(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new EncodingError(`Value ${value} does not fit in U8`);
  }
  return Uint8Array.of(value);
}

export function encodeU32(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new EncodingError(`Value ${value} does not fit in U32`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, true);
  return out;
}

export function encodeI32(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < -0x8000_0000 || value > 0x7fff_ffff) {
    throw new EncodingError(`Value ${value} does not fit in I32`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setInt32(0, value, true);
  return out;
}

export function encodeU64(value: number | bigint): Uint8Array {
  const big = toBigInt(value, "U64");
  if (big < 0n || big > U64_MAX) {
    throw new EncodingError(`Value ${value} does not fit in U64`);
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, big, true);
  return out;
}

export function encodeI64(value: number | bigint): Uint8Array {
  const big = toBigInt(value, "I64");
  if (big < I64_MIN || big > I64_MAX) {
    throw new EncodingError(`Value ${value} does not fit in I64`);
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigInt64(0, big, true);
  return out;
}

/**
 * Encode a string as `[u32 length][utf8 bytes]`
 */
export function encodeString(value: string): Uint8Array {
  const bytes = stringToBytes(value);
  return concatBytes(encodeU32(bytes.length), bytes);
}

/**
 * Encode a byte sequence as `[u32 length][bytes]`
 */
export function encodeBytes(bytes: Uint8Array): Uint8Array {
  return concatBytes(encodeU32(bytes.length), bytes);
}

/**
 * Encode an optional u32 as `[0x00]` or `[0x01][u32]`
 */
export function encodeOptionU32(value: number | undefined): Uint8Array {
  return value === undefined ? Uint8Array.of(0) : concatBytes(Uint8Array.of(1), encodeU32(value));
}

/**
 * Parse a non-negative integer from a decimal string, number or bigint
 *
 * @throws {EncodingError} If the input is not a non-negative integer
 */
export function parseUnsigned(value: BigNumberish, typeName: string = "unsigned integer"): bigint {
  if (typeof value === "bigint") {
    if (value < 0n) {
      throw new EncodingError(`${typeName} must be non-negative, got ${value}`);
    }
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new EncodingError(`${typeName} must be a non-negative safe integer, got ${value}`);
    }
    return BigInt(value);
  }
  if (!/^[0-9]+$/.test(value)) {
    throw new EncodingError(`${typeName} must be a non-negative decimal integer, got "${value}"`);
  }
  return BigInt(value);
}

/**
 * Encode an unsigned big number in the variable-length form used by U128/U256/U512
 *
 * Layout is `[len][magnitude]` where the magnitude is little-endian with its
 * most-significant zero bytes trimmed, keeping at least one byte. Zero therefore
 * encodes as `[0x01, 0x00]`.
 *
 * @param value - Non-negative integer
 * @param maxBytes - Width of the declared type (16, 32 or 64)
 * @throws {EncodingError} If the value is negative or wider than maxBytes
 */
export function encodeBigUnsigned(value: BigNumberish, maxBytes: number, typeName: string = "U512"): Uint8Array {
  const big = parseUnsigned(value, typeName);

  const magnitude: number[] = [];
  let rest = big;
  while (rest > 0n) {
    magnitude.push(Number(rest & 0xffn));
    rest >>= 8n;
  }
  if (magnitude.length === 0) {
    magnitude.push(0);
  }

  if (magnitude.length > maxBytes) {
    throw new EncodingError(`Value ${big} does not fit in ${typeName} (${maxBytes} bytes)`);
  }

  return Uint8Array.from([magnitude.length, ...magnitude]);
}

/**
 * Result of decoding a variable-length unsigned number
 */
export interface DecodedBigUnsigned {
  readonly value: bigint;
  /** Bytes consumed, including the length byte */
  readonly bytesRead: number;
}

/**
 * Decode the `[len][LE magnitude]` form produced by {@link encodeBigUnsigned}
 *
 * @throws {EncodingError} If the input is truncated
 */
export function decodeBigUnsigned(bytes: Uint8Array, offset: number = 0): DecodedBigUnsigned {
  const length = bytes[offset];
  if (length === undefined) {
    throw new EncodingError("Cannot decode big number: missing length byte");
  }
  if (offset + 1 + length > bytes.length) {
    throw new EncodingError(
      `Cannot decode big number: expected ${length} bytes, got ${bytes.length - offset - 1}`,
    );
  }

  let value = 0n;
  for (let i = length - 1; i >= 0; i--) {
    const byte = bytes[offset + 1 + i] ?? 0;
    value = (value << 8n) | BigInt(byte);
  }

  return { value, bytesRead: 1 + length };
}

function toBigInt(value: number | bigint, typeName: string): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    throw new EncodingError(`${typeName} value must be a safe integer or bigint, got ${value}`);
  }
  return BigInt(value);
}
