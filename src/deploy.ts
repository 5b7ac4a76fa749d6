/**
 * Deploy assembly, header serialization and hashing
 */
import { type BigNumberish, encodeString, encodeU32, encodeU64 } from "./bytesrepr.js";
import { blake2b256Hex, concatBytes, hexToBytes } from "./crypto/utils.js";
import { EncodingError, ValidationError } from "./errors.js";
import {
  type ExecutableDeployItem,
  type RuntimeArgs,
  type TransferOptions,
  contractByHashSession,
  copyExecutableDeployItem,
  moduleBytesSession,
  serializeExecutableDeployItem,
  standardPayment,
  transferSession,
} from "./executable.js";
import {
  type Digest,
  type PublicKeyHex,
  type SignatureHex,
  asDigest,
  asPublicKeyHex,
} from "./types.js";

// Constants

/**
 * Defaults applied by {@link buildDeploy} when an option is omitted
 */
export const DEPLOY_DEFAULTS = {
  /** Chain name of the public test network */
  chainName: "casper-test",
  /** Gas price multiplier */
  gasPrice: 1,
  /** Time-to-live in milliseconds (30 minutes) */
  ttl: 1_800_000,
  /**
   * Subtracted from the timestamp so that nodes with a slightly slower clock
   * do not reject the deploy as coming from the future
   */
  timestampSkewMs: 30_000,
} as const;

/** Latest epoch milliseconds a `Date` can represent */
const MAX_TIMESTAMP_MS = 8.64e15;

// Types

export interface DeployHeader {
  /** Tagged public key of the paying account */
  readonly account: PublicKeyHex;
  /** ISO-8601 UTC with millisecond precision, e.g. `2024-01-01T00:00:00.000Z` */
  readonly timestamp: string;
  /** Time-to-live in milliseconds */
  readonly ttl: number;
  readonly gasPrice: number;
  readonly bodyHash: Digest;
  /** Deploys that must execute before this one */
  readonly dependencies: readonly Digest[];
  readonly chainName: string;
}

export interface DeployApproval {
  readonly signer: PublicKeyHex;
  readonly signature: SignatureHex;
}

export interface Deploy {
  /** Blake2b-256 of the serialized header */
  readonly hash: Digest;
  readonly header: DeployHeader;
  readonly payment: ExecutableDeployItem;
  readonly session: ExecutableDeployItem;
  readonly approvals: readonly DeployApproval[];
}

/**
 * What the caller supplies for a deploy
 */
export interface DeployParams {
  /** Tagged public key of the sender */
  readonly account?: string;
  readonly payment?: ExecutableDeployItem;
  readonly session?: ExecutableDeployItem;
  readonly dependencies?: readonly string[];
  /** Creation time before the skew is applied (default: now) */
  readonly timestamp?: Date | number;
}

/**
 * Per-build overrides of {@link DEPLOY_DEFAULTS}
 */
export interface DeployOptions {
  readonly chainName?: string;
  readonly gasPrice?: number;
  readonly ttl?: number;
  readonly timestampSkewMs?: number;
}

// Hashing

/**
 * Body hash: Blake2b-256 of `serialize(payment) ++ serialize(session)`
 */
export function computeBodyHash(payment: ExecutableDeployItem, session: ExecutableDeployItem): Digest {
  const body = concatBytes(serializeExecutableDeployItem(payment), serializeExecutableDeployItem(session));
  return asDigest(blake2b256Hex(body), false);
}

/**
 * Serialize a header in its fixed field order:
 * account, timestamp (u64 ms), ttl (u64), gas price (u64), body hash,
 * dependencies (u32 count + hashes), chain name (length-prefixed)
 *
 * @throws {EncodingError} If a hex field or the timestamp is malformed
 */
export function serializeDeployHeader(header: DeployHeader): Uint8Array {
  return concatBytes(
    hexToBytes(header.account),
    encodeU64(timestampToMillis(header.timestamp)),
    encodeU64(header.ttl),
    encodeU64(header.gasPrice),
    digestBytes(header.bodyHash, "bodyHash"),
    encodeU32(header.dependencies.length),
    ...header.dependencies.map((dep, i) => digestBytes(dep, `dependencies[${i}]`)),
    encodeString(header.chainName),
  );
}

/**
 * Deploy hash: Blake2b-256 of the serialized header
 */
export function computeDeployHash(header: DeployHeader): Digest {
  return asDigest(blake2b256Hex(serializeDeployHeader(header)), false);
}

/**
 * Format a millisecond epoch time as ISO-8601 UTC with millisecond precision
 */
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

/**
 * Parse an ISO-8601 timestamp back to epoch milliseconds
 *
 * @throws {EncodingError} If the timestamp cannot be parsed
 */
export function timestampToMillis(timestamp: string): number {
  const ms = Date.parse(timestamp);
  if (Number.isNaN(ms)) {
    throw new EncodingError(`Invalid timestamp: ${timestamp}`);
  }
  return ms;
}

// Build

/**
 * Build an unsigned deploy
 *
 * Validates every input, computes the body hash, assembles the header and
 * derives the deploy hash. Nothing is returned unless every step succeeds.
 *
 * @throws {ValidationError} If a required field is missing or a setting is out of range
 * @throws {EncodingError} If a hex field or argument cannot be encoded
 *
 * @example
 * ```typescript
 * const deploy = buildDeploy({
 *   account: signer.getPublicKey(),
 *   payment: standardPayment("100000000"),
 *   session: transferSession({ target, amount: "2500000000" }),
 * });
 * ```
 */
export function buildDeploy(params: DeployParams, options: DeployOptions = {}): Deploy {
  const config = {
    chainName: options.chainName ?? DEPLOY_DEFAULTS.chainName,
    gasPrice: options.gasPrice ?? DEPLOY_DEFAULTS.gasPrice,
    ttl: options.ttl ?? DEPLOY_DEFAULTS.ttl,
    timestampSkewMs: options.timestampSkewMs ?? DEPLOY_DEFAULTS.timestampSkewMs,
  };

  const { payment, session } = params;
  if (params.account === undefined || params.account.trim() === "") {
    throw new ValidationError("Sender public key is required");
  }
  if (payment === undefined) {
    throw new ValidationError("Payment is required");
  }
  if (session === undefined) {
    throw new ValidationError("Session is required");
  }

  hexToBytes(params.account);
  const account = asPublicKeyHex(params.account);
  assertPositiveInteger(config.gasPrice, "Gas price");
  assertPositiveInteger(config.ttl, "TTL");
  if (!Number.isInteger(config.timestampSkewMs) || config.timestampSkewMs < 0) {
    throw new ValidationError(`Timestamp skew must be a non-negative integer, got ${config.timestampSkewMs}`);
  }
  if (config.chainName.trim() === "") {
    throw new ValidationError("Chain name cannot be empty");
  }
  const dependencies = (params.dependencies ?? []).map((dep) => {
    hexToBytes(dep);
    return asDigest(dep);
  });

  const createdAt = params.timestamp === undefined ? Date.now() : Number(params.timestamp);
  if (!Number.isFinite(createdAt)) {
    throw new ValidationError("Timestamp is not a valid date");
  }
  const stamped = createdAt - config.timestampSkewMs;
  if (stamped < 0 || stamped > MAX_TIMESTAMP_MS) {
    throw new ValidationError(`Timestamp is out of range: ${stamped} ms after the epoch`);
  }
  const timestamp = formatTimestamp(stamped);

  // bodyHash covers these copies, not the caller's arrays
  const ownPayment = copyExecutableDeployItem(payment);
  const ownSession = copyExecutableDeployItem(session);

  const header: DeployHeader = {
    account,
    timestamp,
    ttl: config.ttl,
    gasPrice: config.gasPrice,
    bodyHash: computeBodyHash(ownPayment, ownSession),
    dependencies,
    chainName: config.chainName,
  };

  return {
    hash: computeDeployHash(header),
    header,
    payment: ownPayment,
    session: ownSession,
    approvals: [],
  };
}

/**
 * Fluent wrapper around {@link buildDeploy}
 *
 * @example
 * ```typescript
 * const deploy = new DeployBuilder()
 *   .setSender(signer.getPublicKey())
 *   .setStandardPayment("100000000")
 *   .setTransferSession({ target, amount: "2500000000" })
 *   .build();
 * ```
 */
export class DeployBuilder {
  private account: string | undefined;
  private payment: ExecutableDeployItem | undefined;
  private session: ExecutableDeployItem | undefined;
  private dependencies: readonly string[] = [];
  private timestamp: Date | number | undefined;
  private options: DeployOptions = {};

  setSender(publicKey: string): this {
    if (publicKey.trim() === "") {
      throw new ValidationError("Sender public key cannot be empty");
    }
    this.account = publicKey;
    return this;
  }

  setChainName(chainName: string): this {
    if (chainName.trim() === "") {
      throw new ValidationError("Chain name cannot be empty");
    }
    this.options = { ...this.options, chainName };
    return this;
  }

  setGasPrice(gasPrice: number): this {
    assertPositiveInteger(gasPrice, "Gas price");
    this.options = { ...this.options, gasPrice };
    return this;
  }

  /**
   * @param ttl - Time-to-live in milliseconds
   */
  setTtl(ttl: number): this {
    assertPositiveInteger(ttl, "TTL");
    this.options = { ...this.options, ttl };
    return this;
  }

  /**
   * Pin the creation time; the clock-skew margin is still subtracted
   */
  setTimestamp(timestamp: Date | number): this {
    this.timestamp = timestamp;
    return this;
  }

  setTimestampSkew(skewMs: number): this {
    this.options = { ...this.options, timestampSkewMs: skewMs };
    return this;
  }

  setDependencies(deployHashes: readonly string[]): this {
    this.dependencies = [...deployHashes];
    return this;
  }

  setPayment(payment: ExecutableDeployItem): this {
    this.payment = payment;
    return this;
  }

  setStandardPayment(amount: BigNumberish): this {
    return this.setPayment(standardPayment(amount));
  }

  setSession(session: ExecutableDeployItem): this {
    this.session = session;
    return this;
  }

  setTransferSession(transfer: TransferOptions): this {
    return this.setSession(transferSession(transfer));
  }

  setContractSession(contractHash: string, entryPoint: string, args: RuntimeArgs = []): this {
    return this.setSession(contractByHashSession(contractHash, entryPoint, args));
  }

  setWasmSession(moduleBytes: Uint8Array, args: RuntimeArgs = []): this {
    return this.setSession(moduleBytesSession(moduleBytes, args));
  }

  build(): Deploy {
    return buildDeploy(
      {
        ...(this.account !== undefined ? { account: this.account } : {}),
        ...(this.payment !== undefined ? { payment: this.payment } : {}),
        ...(this.session !== undefined ? { session: this.session } : {}),
        ...(this.timestamp !== undefined ? { timestamp: this.timestamp } : {}),
        dependencies: this.dependencies,
      },
      this.options,
    );
  }
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
}

function digestBytes(value: string, name: string): Uint8Array {
  const bytes = hexToBytes(value);
  if (bytes.length !== 32) {
    throw new EncodingError(`${name} must be 32 bytes, got ${bytes.length}`);
  }
  return bytes;
}
