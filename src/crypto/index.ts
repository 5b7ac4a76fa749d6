/**
 * Crypto module
 *
 * Hashing, key derivation and signature primitives built on the noble
 * libraries (@noble/hashes, @noble/secp256k1, @noble/curves).
 */

// Utility functions
export {
  bytesToHex,
  hexToBytes,
  stringToBytes,
  concatBytes,
  bytesEqual,
  blake2b256,
  blake2b256Hex,
} from "./utils.js";

// Key material
export {
  PRIVATE_KEY_LENGTH,
  generateKeyPair,
  keyPairFromPrivateKey,
  publicKeyFromPrivateKey,
  tagPublicKey,
  accountHashFromPublicKey,
  parsePrivateKey,
} from "./keys.js";

export type {
  KeyPair,
} from "./keys.js";

// Signer interface and implementation
export {
  HASH_LENGTH,
  SIGNATURE_LENGTH,
  signHash,
  verifySignature,
  PrivateKeySigner,
} from "./signer.js";

export type {
  DeploySigner,
} from "./signer.js";
