/**
 * Integrity checks for deploys of unknown provenance
 *
 * A deploy parsed from JSON carries hashes and approvals that nobody has
 * recomputed. These checks derive both hashes from the deploy's own content
 * and verify every approval against the recomputed deploy hash.
 *
 * @module validation
 */
import { verifySignature } from "./crypto/signer.js";
import { type Deploy, computeBodyHash, computeDeployHash } from "./deploy.js";
import { ValidationError } from "./errors.js";
import type { PublicKeyHex } from "./types.js";

export interface ApprovalCheck {
  readonly signer: PublicKeyHex;
  readonly valid: boolean;
}

export interface DeployValidationReport {
  /** All checks passed and at least one approval is present */
  readonly valid: boolean;
  readonly bodyHashMatches: boolean;
  readonly hashMatches: boolean;
  readonly approvals: readonly ApprovalCheck[];
}

/**
 * Recompute the body hash and deploy hash and verify each approval
 *
 * Approvals are checked against the recomputed hash, so a deploy whose header
 * was altered after signing fails even if its stored hash was updated too.
 *
 * @throws {EncodingError} If the deploy holds malformed hex
 *
 * @example
 * ```typescript
 * const report = validateDeploy(parseDeployJson(payload));
 * if (!report.valid) {
 *   console.error(report);
 * }
 * ```
 */
export function validateDeploy(deploy: Deploy): DeployValidationReport {
  const bodyHash = computeBodyHash(deploy.payment, deploy.session);
  const hash = computeDeployHash({ ...deploy.header, bodyHash });

  const bodyHashMatches = bodyHash === deploy.header.bodyHash;
  const hashMatches = hash === deploy.hash;
  const approvals = deploy.approvals.map((approval) => ({
    signer: approval.signer,
    valid: verifySignature(hash, approval.signature, approval.signer),
  }));

  return {
    valid: bodyHashMatches && hashMatches && approvals.length > 0 && approvals.every((a) => a.valid),
    bodyHashMatches,
    hashMatches,
    approvals,
  };
}

/**
 * Throw unless {@link validateDeploy} reports the deploy valid
 *
 * @throws {ValidationError} Naming the first failed check
 */
export function assertValidDeploy(deploy: Deploy): void {
  const report = validateDeploy(deploy);
  if (report.valid) {
    return;
  }
  if (!report.bodyHashMatches) {
    throw new ValidationError("Body hash does not match payment and session");
  }
  if (!report.hashMatches) {
    throw new ValidationError("Deploy hash does not match header");
  }
  if (report.approvals.length === 0) {
    throw new ValidationError("Deploy has no approvals");
  }
  const invalid = report.approvals.find((a) => !a.valid);
  throw new ValidationError(`Invalid approval from ${invalid?.signer ?? "unknown signer"}`);
}
