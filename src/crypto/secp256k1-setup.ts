/**
 * @noble/secp256k1 with HMAC-SHA256 wired in for synchronous RFC 6979 signing
 *
 * Import `secp` from here rather than from @noble/secp256k1 so `signHash` never
 * runs against an unconfigured curve.
 */
import * as secp from "@noble/secp256k1";
import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha2";

secp.etc.hmacSha256Sync = (key, ...messages) => hmac(sha256, key, secp.etc.concatBytes(...messages));

export { secp };
