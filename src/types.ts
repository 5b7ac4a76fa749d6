import { ValidationError } from "./errors.js";

// Branded Types

/**
 * Unique symbol for creating branded types
 * @internal
 */
declare const __brand: unique symbol;

/**
 * Generic brand wrapper for creating nominal types
 *
 * This pattern creates "phantom types" that are structurally identical to the base type
 * but are nominally distinct, preventing accidental mixing of similar types.
 *
 * @internal
 */
export type Brand<T, TBrand extends string> = T & { readonly [__brand]: TBrand };

/**
 * Signature algorithms accepted by the network
 *
 * The value is the one-byte tag that prefixes public keys and signatures.
 */
export type KeyAlgorithm = "ed25519" | "secp256k1";

/**
 * Algorithm tag bytes as they appear in front of keys and signatures
 */
export const ALGORITHM_TAGS = {
  ed25519: 0x01,
  secp256k1: 0x02,
} as const satisfies Record<KeyAlgorithm, number>;

/**
 * Length in bytes of the raw (untagged) public key per algorithm
 */
export const PUBLIC_KEY_LENGTHS = {
  ed25519: 32,
  secp256k1: 33,
} as const satisfies Record<KeyAlgorithm, number>;

/**
 * Branded type for 32-byte hashes rendered as 64 lowercase hex characters
 *
 * Deploy hashes, body hashes and dependency hashes all share this shape.
 */
export type Digest = Brand<string, "Digest">;

/**
 * Branded type for algorithm-tagged public keys
 *
 * `01` + 32-byte Ed25519 key (66 hex chars) or `02` + 33-byte compressed
 * secp256k1 point (68 hex chars).
 */
export type PublicKeyHex = Brand<string, "PublicKeyHex">;

/**
 * Branded type for algorithm-tagged signatures (`01`/`02` + 64 bytes)
 */
export type SignatureHex = Brand<string, "SignatureHex">;

/**
 * Branded type for account hashes in their textual `account-hash-<hex>` form
 */
export type AccountHash = Brand<string, "AccountHash">;

export const ACCOUNT_HASH_PREFIX = "account-hash-";

/**
 * Create a Digest from a string, normalizing to lowercase without 0x prefix
 * @param value - String to convert to Digest
 * @param validate - If true, validates format at runtime (default: true)
 * @throws {ValidationError} If validate=true and format is invalid
 */
export function asDigest(value: string, validate: boolean = true): Digest {
  const normalized = stripHexPrefix(value).toLowerCase();
  if (validate && !isDigest(normalized)) {
    throw new ValidationError(`Invalid digest format (expected 32-byte hex): ${value}`);
  }
  return normalized as Digest;
}

/**
 * Check if a string is a valid Digest (32-byte hex, 64 characters)
 */
export function isDigest(value: string): value is Digest {
  return /^[0-9a-fA-F]{64}$/.test(value);
}

/**
 * Assert that a string is a valid Digest, throwing error with helpful message if not
 * @param value - String to validate
 * @param name - Parameter name for error message (default: "value")
 * @throws {ValidationError} If value is not a valid digest
 */
export function assertDigest(value: string, name: string = "value"): asserts value is Digest {
  if (!isDigest(value)) {
    throw new ValidationError(`${name} must be a 32-byte hex hash (64 characters), got ${value}`);
  }
}

/**
 * Create a PublicKeyHex from a string, normalizing to lowercase
 * @throws {ValidationError} If validate=true and format is invalid
 */
export function asPublicKeyHex(value: string, validate: boolean = true): PublicKeyHex {
  const normalized = stripHexPrefix(value).toLowerCase();
  if (validate && !isPublicKeyHex(normalized)) {
    throw new ValidationError(
      `Invalid public key format: ${value} (expected 01 + 32 bytes or 02 + 33 bytes)`,
    );
  }
  return normalized as PublicKeyHex;
}

/**
 * Check if a string is a tagged public key: `01` + 64 hex chars or `02` + 66 hex chars
 */
export function isPublicKeyHex(value: string): value is PublicKeyHex {
  return /^01[0-9a-fA-F]{64}$/.test(value) || /^02[0-9a-fA-F]{66}$/.test(value);
}

/**
 * Assert that a string is a tagged public key
 * @throws {ValidationError} If value is not a valid public key
 */
export function assertPublicKeyHex(value: string, name: string = "value"): asserts value is PublicKeyHex {
  if (!isPublicKeyHex(value)) {
    throw new ValidationError(
      `${name} must be a tagged public key (01 + 32 bytes or 02 + 33 bytes), got ${value}`,
    );
  }
}

/**
 * Create a SignatureHex from a string, normalizing to lowercase
 * @throws {ValidationError} If validate=true and format is invalid
 */
export function asSignatureHex(value: string, validate: boolean = true): SignatureHex {
  const normalized = stripHexPrefix(value).toLowerCase();
  if (validate && !isSignatureHex(normalized)) {
    throw new ValidationError(`Invalid signature format: ${value} (expected 01/02 + 64 bytes)`);
  }
  return normalized as SignatureHex;
}

/**
 * Check if a string is a tagged signature (`01`/`02` + 128 hex chars)
 */
export function isSignatureHex(value: string): value is SignatureHex {
  return /^0[12][0-9a-fA-F]{128}$/.test(value);
}

/**
 * Create an AccountHash from either `account-hash-<hex>` or bare hex
 * @throws {ValidationError} If validate=true and format is invalid
 */
export function asAccountHash(value: string, validate: boolean = true): AccountHash {
  const hex = value.startsWith(ACCOUNT_HASH_PREFIX) ? value.slice(ACCOUNT_HASH_PREFIX.length) : value;
  const normalized = `${ACCOUNT_HASH_PREFIX}${hex.toLowerCase()}`;
  if (validate && !isAccountHash(normalized)) {
    throw new ValidationError(`Invalid account hash format: ${value}`);
  }
  return normalized as AccountHash;
}

/**
 * Check if a string is an account hash in `account-hash-<64 hex>` form
 */
export function isAccountHash(value: string): value is AccountHash {
  return /^account-hash-[0-9a-fA-F]{64}$/.test(value);
}

/**
 * Resolve the algorithm of a tagged public key from its first byte
 *
 * Only `01` maps to Ed25519; every other prefix is treated as secp256k1.
 */
export function algorithmOfPublicKey(publicKey: string): KeyAlgorithm {
  return publicKey.startsWith("01") ? "ed25519" : "secp256k1";
}

function stripHexPrefix(value: string): string {
  return value.startsWith("0x") ? value.slice(2) : value;
}
