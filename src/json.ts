/**
 * JSON-RPC rendering of deploys
 *
 * Field names follow the node's snake_case JSON. Executable items render as
 * a single-key object naming the variant, and runtime args as
 * `[name, { cl_type, bytes, parsed }]` tuples.
 */
import { type CLTypeJson, clTypeToJson } from "./cl-type.js";
import type { CLParsed, CLValue } from "./cl-value.js";
import { bytesToHex } from "./crypto/utils.js";
import type { Deploy, DeployApproval } from "./deploy.js";
import type { ExecutableDeployItem, RuntimeArgs } from "./executable.js";
import { ValidationError } from "./errors.js";

// JSON shapes

export interface CLValueJson {
  readonly cl_type: CLTypeJson;
  readonly bytes: string;
  readonly parsed: CLParsed;
}

export type RuntimeArgJson = readonly [string, CLValueJson];

export type ExecutableDeployItemJson =
  | { readonly ModuleBytes: { readonly module_bytes: string; readonly args: readonly RuntimeArgJson[] } }
  | {
      readonly StoredContractByHash: {
        readonly hash: string;
        readonly entry_point: string;
        readonly args: readonly RuntimeArgJson[];
      };
    }
  | {
      readonly StoredContractByName: {
        readonly name: string;
        readonly entry_point: string;
        readonly args: readonly RuntimeArgJson[];
      };
    }
  | {
      readonly StoredVersionedContractByHash: {
        readonly hash: string;
        readonly version: number | null;
        readonly entry_point: string;
        readonly args: readonly RuntimeArgJson[];
      };
    }
  | {
      readonly StoredVersionedContractByName: {
        readonly name: string;
        readonly version: number | null;
        readonly entry_point: string;
        readonly args: readonly RuntimeArgJson[];
      };
    }
  | { readonly Transfer: { readonly args: readonly RuntimeArgJson[] } };

export interface DeployHeaderJson {
  readonly account: string;
  readonly timestamp: string;
  /** Duration such as `30m` or `1h 30m` */
  readonly ttl: string;
  readonly gas_price: number;
  readonly body_hash: string;
  readonly dependencies: readonly string[];
  readonly chain_name: string;
}

export interface DeployJson {
  readonly hash: string;
  readonly header: DeployHeaderJson;
  readonly payment: ExecutableDeployItemJson;
  readonly session: ExecutableDeployItemJson;
  readonly approvals: readonly DeployApproval[];
}

// Rendering

export function clValueToJson(value: CLValue): CLValueJson {
  return {
    cl_type: clTypeToJson(value.clType),
    bytes: bytesToHex(value.bytes),
    parsed: value.parsed,
  };
}

export function runtimeArgsToJson(args: RuntimeArgs): RuntimeArgJson[] {
  return args.map((arg) => [arg.name, clValueToJson(arg.value)] as const);
}

export function executableDeployItemToJson(item: ExecutableDeployItem): ExecutableDeployItemJson {
  const args = runtimeArgsToJson(item.args);

  switch (item.kind) {
    case "ModuleBytes":
      return { ModuleBytes: { module_bytes: bytesToHex(item.moduleBytes), args } };
    case "StoredContractByHash":
      return { StoredContractByHash: { hash: item.hash, entry_point: item.entryPoint, args } };
    case "StoredContractByName":
      return { StoredContractByName: { name: item.name, entry_point: item.entryPoint, args } };
    case "StoredVersionedContractByHash":
      return {
        StoredVersionedContractByHash: {
          hash: item.hash,
          version: item.version ?? null,
          entry_point: item.entryPoint,
          args,
        },
      };
    case "StoredVersionedContractByName":
      return {
        StoredVersionedContractByName: {
          name: item.name,
          version: item.version ?? null,
          entry_point: item.entryPoint,
          args,
        },
      };
    case "Transfer":
      return { Transfer: { args } };
    default: {
      const _exhaustive: never = item;
      throw new ValidationError(`Unknown executable item: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Render a deploy in the shape the node's `account_put_deploy` expects
 *
 * @example
 * ```typescript
 * const body = { jsonrpc: "2.0", id: 1, method: "account_put_deploy", params: { deploy: deployToJson(signed) } };
 * ```
 */
export function deployToJson(deploy: Deploy): DeployJson {
  const { header } = deploy;
  return {
    hash: deploy.hash,
    header: {
      account: header.account,
      timestamp: header.timestamp,
      ttl: formatTtl(header.ttl),
      gas_price: header.gasPrice,
      body_hash: header.bodyHash,
      dependencies: [...header.dependencies],
      chain_name: header.chainName,
    },
    payment: executableDeployItemToJson(deploy.payment),
    session: executableDeployItemToJson(deploy.session),
    approvals: deploy.approvals.map((a) => ({ signer: a.signer, signature: a.signature })),
  };
}

// Durations

const TTL_UNIT_MS = {
  d: 86_400_000,
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
} as const;

type TtlUnit = keyof typeof TTL_UNIT_MS;

/** Largest first */
const TTL_UNITS: readonly TtlUnit[] = ["d", "h", "m", "s", "ms"];

function isTtlUnit(value: string): value is TtlUnit {
  return Object.prototype.hasOwnProperty.call(TTL_UNIT_MS, value);
}

/**
 * Render milliseconds as space-separated units, largest first
 *
 * `1_800_000` → `"30m"`, `5_400_000` → `"1h 30m"`, `0` → `"0ms"`.
 *
 * @throws {ValidationError} If ms is not a non-negative integer
 */
export function formatTtl(ms: number): string {
  if (!Number.isSafeInteger(ms) || ms < 0) {
    throw new ValidationError(`TTL must be a non-negative integer of milliseconds, got ${ms}`);
  }
  if (ms === 0) {
    return "0ms";
  }

  const parts: string[] = [];
  let remaining = ms;
  for (const unit of TTL_UNITS) {
    const size = TTL_UNIT_MS[unit];
    const count = Math.floor(remaining / size);
    if (count > 0) {
      parts.push(`${count}${unit}`);
      remaining -= count * size;
    }
  }
  return parts.join(" ");
}

/**
 * Parse a duration produced by {@link formatTtl} (units `d h m s ms`)
 *
 * @throws {ValidationError} If the text is not a duration
 */
export function parseTtl(text: string): number {
  const tokens = text.trim().split(/\s+/);
  let total = 0;
  for (const token of tokens) {
    const match = /^(\d+)(ms|s|m|h|d)$/.exec(token);
    const count = match?.[1];
    const unit = match?.[2];
    if (count === undefined || unit === undefined || !isTtlUnit(unit)) {
      throw new ValidationError(`Invalid TTL: ${text}`);
    }
    total += Number(count) * TTL_UNIT_MS[unit];
  }
  if (!Number.isSafeInteger(total)) {
    throw new ValidationError(`TTL out of range: ${text}`);
  }
  return total;
}
