import { blake2b } from "@noble/hashes/blake2b";
import { EncodingError } from "../errors.js";

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * Convert bytes to a lowercase hex string (no 0x prefix, as the network renders hex)
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Convert hex string (with or without 0x prefix) to bytes
 *
 * @throws {EncodingError} If the string has odd length or a non-hex character
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith("0x") ? hex.slice(2) : hex;

  if (cleanHex.length % 2 !== 0) {
    throw new EncodingError(`Invalid hex string: odd length (${cleanHex.length})`);
  }
  if (!HEX_PATTERN.test(cleanHex)) {
    throw new EncodingError(`Invalid hex string: ${truncate(cleanHex)}`);
  }

  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < cleanHex.length; i += 2) {
    bytes[i / 2] = parseInt(cleanHex.slice(i, i + 2), 16);
  }

  return bytes;
}

/**
 * Convert UTF-8 string to bytes using TextEncoder
 */
export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/**
 * Concatenate multiple byte arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Compare two byte arrays for equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Compute the network hash: Blake2b with a 32-byte digest.
 *
 * Used for the body hash, the deploy hash and account-hash derivation.
 */
export function blake2b256(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 32 });
}

/**
 * Compute Blake2b-256 and render it as hex
 */
export function blake2b256Hex(data: Uint8Array): string {
  return bytesToHex(blake2b256(data));
}

function truncate(value: string): string {
  return value.length > 16 ? `${value.slice(0, 16)}...` : value;
}
