import { ed25519 } from "@noble/curves/ed25519";
import { secp } from "./secp256k1-setup.js";
import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex, concatBytes, hexToBytes } from "./utils.js";
import {
  type KeyPair,
  generateKeyPair,
  keyPairFromPrivateKey,
  parsePrivateKey,
} from "./keys.js";
import { SigningError } from "../errors.js";
import {
  ALGORITHM_TAGS,
  algorithmOfPublicKey,
  type AccountHash,
  type KeyAlgorithm,
  type PublicKeyHex,
  type SignatureHex,
} from "../types.js";

/** Deploy hashes are always 32 bytes */
export const HASH_LENGTH = 32;

/** Raw signatures are 64 bytes for both algorithms */
export const SIGNATURE_LENGTH = 64;

/**
 * Anything that can approve a deploy
 *
 * PrivateKeySigner is the in-process implementation; wallets or hardware keys
 * can implement the same interface.
 */
export interface DeploySigner {
  /**
   * Tagged public key recorded as the approval's signer
   */
  getPublicKey(): PublicKeyHex;

  /**
   * Sign a 32-byte deploy hash
   *
   * @returns Tagged signature hex
   */
  signHash(hash: Uint8Array): SignatureHex;
}

/**
 * Sign a 32-byte hash with the given algorithm
 *
 * - Ed25519 signs the hash bytes directly (the scheme hashes internally), output `01` + 64 bytes.
 * - secp256k1 signs `sha256(hash)` with deterministic ECDSA and emits R‖S as two
 *   32-byte big-endian integers, output `02` + 64 bytes.
 *
 * @param hash - 32-byte hash
 * @param privateKey - 32 raw bytes or their hex encoding
 * @throws {SigningError} If the hash or the private key is malformed
 */
export function signHash(
  hash: Uint8Array,
  privateKey: Uint8Array | string,
  algorithm: KeyAlgorithm,
): SignatureHex {
  if (hash.length !== HASH_LENGTH) {
    throw new SigningError(`Hash to sign must be ${HASH_LENGTH} bytes, got ${hash.length}`);
  }
  const key = parsePrivateKey(privateKey);

  let raw: Uint8Array;
  try {
    raw =
      algorithm === "ed25519"
        ? ed25519.sign(hash, key)
        : secp.sign(sha256(hash), key).toCompactRawBytes();
  } catch (error) {
    throw new SigningError(
      `${algorithm} signing failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  return bytesToHex(concatBytes(Uint8Array.of(ALGORITHM_TAGS[algorithm]), raw)) as SignatureHex;
}

/**
 * Verify a tagged signature over a hash
 *
 * The algorithm is inferred from the public key prefix: `01` selects Ed25519,
 * anything else selects secp256k1. The matching tag is stripped from both the
 * signature and the key when present. A key with an unexpected prefix is routed
 * to the secp256k1 verifier and yields `false`.
 *
 * @param hash - Hash as hex or raw bytes
 * @returns true if the signature is valid, false otherwise
 * @throws {EncodingError} If any hex input is malformed
 */
export function verifySignature(
  hash: string | Uint8Array,
  signatureHex: string,
  publicKeyHex: string,
): boolean {
  const algorithm = algorithmOfPublicKey(publicKeyHex);
  const tag = algorithm === "ed25519" ? "01" : "02";

  const hashBytes = typeof hash === "string" ? hexToBytes(hash) : hash;
  const signature = hexToBytes(stripTag(signatureHex, tag));
  const publicKey = hexToBytes(stripTag(publicKeyHex, tag));

  try {
    if (algorithm === "ed25519") {
      return ed25519.verify(signature, hashBytes, publicKey);
    }
    return secp.verify(signature, sha256(hashBytes), publicKey);
  } catch {
    // Wrong lengths and off-curve points are "does not verify", not errors
    return false;
  }
}

/**
 * In-process signer backed by a private key
 */
export class PrivateKeySigner implements DeploySigner {
  private readonly keyPair: KeyPair;

  /**
   * Create a signer from a private key
   *
   * Warning: Never log or display private keys. Store them securely.
   *
   * @param privateKey - 32 raw bytes or hex
   * @throws {SigningError} If the private key is malformed
   */
  constructor(privateKey: Uint8Array | string, algorithm: KeyAlgorithm = "ed25519") {
    this.keyPair = keyPairFromPrivateKey(privateKey, algorithm);
  }

  /**
   * Create a signer for an existing key pair
   */
  static fromKeyPair(keyPair: KeyPair): PrivateKeySigner {
    return new PrivateKeySigner(keyPair.privateKey, keyPair.algorithm);
  }

  /**
   * Create a random signer with a new private key
   */
  static random(algorithm: KeyAlgorithm = "ed25519"): PrivateKeySigner {
    return PrivateKeySigner.fromKeyPair(generateKeyPair(algorithm));
  }

  get algorithm(): KeyAlgorithm {
    return this.keyPair.algorithm;
  }

  getPublicKey(): PublicKeyHex {
    return this.keyPair.publicKey;
  }

  getAccountHash(): AccountHash {
    return this.keyPair.accountHash;
  }

  signHash(hash: Uint8Array): SignatureHex {
    return signHash(hash, this.keyPair.privateKey, this.keyPair.algorithm);
  }
}

function stripTag(value: string, tag: string): string {
  return value.startsWith(tag) ? value.slice(tag.length) : value;
}
