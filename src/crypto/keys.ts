import { ed25519 } from "@noble/curves/ed25519";
import { secp } from "./secp256k1-setup.js";
import { blake2b256, bytesToHex, concatBytes, hexToBytes, stringToBytes } from "./utils.js";
import { DeployError, SigningError } from "../errors.js";
import {
  ACCOUNT_HASH_PREFIX,
  ALGORITHM_TAGS,
  PUBLIC_KEY_LENGTHS,
  algorithmOfPublicKey,
  asPublicKeyHex,
  type AccountHash,
  type KeyAlgorithm,
  type PublicKeyHex,
} from "../types.js";

/** Private keys are 32 raw bytes for both algorithms */
export const PRIVATE_KEY_LENGTH = 32;

/**
 * A key pair tagged with its algorithm
 *
 * Warning: `privateKey` is security-sensitive material. Never log, display,
 * or transmit it.
 */
export interface KeyPair {
  readonly algorithm: KeyAlgorithm;
  /** Tagged public key (`01…` or `02…`) */
  readonly publicKey: PublicKeyHex;
  /** Raw 32-byte private key */
  readonly privateKey: Uint8Array;
  readonly accountHash: AccountHash;
}

/**
 * Generate a fresh key pair from the platform CSPRNG
 */
export function generateKeyPair(algorithm: KeyAlgorithm = "ed25519"): KeyPair {
  const privateKey =
    algorithm === "ed25519" ? ed25519.utils.randomPrivateKey() : secp.utils.randomPrivateKey();
  return keyPairFromPrivateKey(privateKey, algorithm);
}

/**
 * Derive the full key pair from a private key
 *
 * @param privateKey - 32 raw bytes or their hex encoding
 * @throws {SigningError} If the key is not 32 bytes or not a valid scalar for the curve
 */
export function keyPairFromPrivateKey(
  privateKey: Uint8Array | string,
  algorithm: KeyAlgorithm = "ed25519",
): KeyPair {
  const raw = parsePrivateKey(privateKey);
  const publicKey = publicKeyFromPrivateKey(raw, algorithm);
  return {
    algorithm,
    publicKey,
    privateKey: raw,
    accountHash: accountHashFromPublicKey(publicKey),
  };
}

/**
 * Derive the tagged public key for a private key
 *
 * @throws {SigningError} If the private key is malformed
 */
export function publicKeyFromPrivateKey(privateKey: Uint8Array, algorithm: KeyAlgorithm): PublicKeyHex {
  try {
    const raw =
      algorithm === "ed25519"
        ? ed25519.getPublicKey(privateKey)
        : secp.getPublicKey(privateKey, true);
    return tagPublicKey(raw, algorithm);
  } catch (error) {
    throw new SigningError(
      `Invalid ${algorithm} private key: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * Prefix a raw public key with its algorithm tag
 *
 * @throws {SigningError} If the raw key has the wrong length for the algorithm
 */
export function tagPublicKey(raw: Uint8Array, algorithm: KeyAlgorithm): PublicKeyHex {
  if (raw.length !== PUBLIC_KEY_LENGTHS[algorithm]) {
    throw new SigningError(
      `${algorithm} public key must be ${PUBLIC_KEY_LENGTHS[algorithm]} bytes, got ${raw.length}`,
    );
  }
  return bytesToHex(concatBytes(Uint8Array.of(ALGORITHM_TAGS[algorithm]), raw)) as PublicKeyHex;
}

/**
 * Derive the account hash of a tagged public key
 *
 * `blake2b256(utf8(algorithm name) ++ 0x00 ++ raw key bytes)`, rendered as
 * `account-hash-<hex>`. The raw key bytes exclude the one-byte tag.
 *
 * @throws {ValidationError} If the value is not a tagged public key
 */
export function accountHashFromPublicKey(publicKey: string): AccountHash {
  const tagged = asPublicKeyHex(publicKey);
  const algorithm = algorithmOfPublicKey(tagged);
  const raw = hexToBytes(tagged.slice(2));
  const preimage = concatBytes(stringToBytes(algorithm), Uint8Array.of(0), raw);
  return `${ACCOUNT_HASH_PREFIX}${bytesToHex(blake2b256(preimage))}` as AccountHash;
}

/**
 * Normalize a private key to 32 raw bytes
 *
 * @throws {SigningError} If the key is malformed hex or has the wrong length
 */
export function parsePrivateKey(privateKey: Uint8Array | string): Uint8Array {
  let raw: Uint8Array;
  try {
    raw = typeof privateKey === "string" ? hexToBytes(privateKey) : privateKey;
  } catch (error) {
    if (error instanceof DeployError) {
      throw new SigningError(`Invalid private key: ${error.message}`, { cause: error });
    }
    throw error;
  }
  if (raw.length !== PRIVATE_KEY_LENGTH) {
    throw new SigningError(
      `Invalid private key length: ${raw.length} bytes, expected ${PRIVATE_KEY_LENGTH}`,
    );
  }
  return raw;
}
