/**
 * Deploy approvals: signing a built deploy and checking its signatures
 */
import type { Deploy, DeployApproval } from "./deploy.js";
import { type DeploySigner, verifySignature } from "./crypto/signer.js";
import { hexToBytes } from "./crypto/utils.js";
import { asPublicKeyHex, asSignatureHex } from "./types.js";

/**
 * Sign a deploy's hash and return a new deploy with the approval appended
 *
 * The input deploy is left untouched. Approvals keep insertion order and are
 * not de-duplicated, so signing twice with the same key yields two entries.
 *
 * @throws {SigningError} If the signer rejects the hash
 *
 * @example
 * ```typescript
 * const signed = signDeploy(deploy, PrivateKeySigner.random());
 * console.log(signed.approvals.length); // 1
 * ```
 */
export function signDeploy(deploy: Deploy, signer: DeploySigner): Deploy {
  const signature = signer.signHash(hexToBytes(deploy.hash));
  const approval: DeployApproval = {
    signer: asPublicKeyHex(signer.getPublicKey()),
    signature: asSignatureHex(signature),
  };
  return { ...deploy, approvals: [...deploy.approvals, approval] };
}

/**
 * Sign with several keys in order; each signer adds one approval
 */
export function signDeployWithAll(deploy: Deploy, signers: readonly DeploySigner[]): Deploy {
  return signers.reduce<Deploy>((acc, signer) => signDeploy(acc, signer), deploy);
}

/**
 * Check one approval against the deploy hash
 *
 * @throws {EncodingError} If the approval holds malformed hex
 */
export function verifyApproval(deploy: Deploy, approval: DeployApproval): boolean {
  return verifySignature(deploy.hash, approval.signature, approval.signer);
}

/**
 * True when the deploy has at least one approval and every approval verifies
 */
export function verifyDeployApprovals(deploy: Deploy): boolean {
  return deploy.approvals.length > 0 && deploy.approvals.every((approval) => verifyApproval(deploy, approval));
}
