/**
 * Parsers for deploys received as JSON
 *
 * The inverse of the renderers in json.ts. Input is untrusted `unknown`; every
 * field is checked before it becomes part of a typed deploy. Hashes are not
 * recomputed here, see validateDeploy for that.
 */
import {
  type CLType,
  CLTypes,
  byteArrayType,
  isSimpleCLTypeName,
  listType,
  mapType,
  optionType,
} from "./cl-type.js";
import type { CLParsed, CLValue } from "./cl-value.js";
import { hexToBytes } from "./crypto/utils.js";
import { type Deploy, type DeployApproval, type DeployHeader, timestampToMillis } from "./deploy.js";
import { DeployError, ValidationError } from "./errors.js";
import type { ExecutableDeployItem, RuntimeArg, RuntimeArgs } from "./executable.js";
import { parseTtl } from "./json.js";
import { asDigest, asPublicKeyHex, asSignatureHex } from "./types.js";

/**
 * Parse a deploy from its JSON-RPC rendering
 *
 * @throws {ValidationError} If a field is missing, has the wrong type or names an unknown variant
 * @throws {EncodingError} If a hex field is malformed
 */
export function parseDeployJson(data: unknown): Deploy {
  const obj = asRecord(data, "deploy");
  const approvals = asArray(obj["approvals"], "approvals").map((entry, i) =>
    parseApproval(entry, `approvals[${i}]`),
  );

  return {
    hash: asDigest(asString(obj["hash"], "hash")),
    header: parseHeader(obj["header"]),
    payment: parseExecutableDeployItem(obj["payment"], "payment"),
    session: parseExecutableDeployItem(obj["session"], "session"),
    approvals,
  };
}

/**
 * Parse a CLType from its JSON rendering (`"U64"`, `{"Option":"U64"}`, ...)
 *
 * @throws {ValidationError} If the shape does not name a known CLType
 */
export function parseCLTypeJson(data: unknown, path: string = "cl_type"): CLType {
  if (typeof data === "string") {
    if (!isSimpleCLTypeName(data)) {
      throw new ValidationError(`${path}: unknown CLType ${data}`);
    }
    return CLTypes[data];
  }

  const obj = asRecord(data, path);
  const keys = Object.keys(obj);
  const kind = keys[0];
  if (keys.length !== 1 || kind === undefined) {
    throw new ValidationError(`${path}: expected a single-key CLType object`);
  }

  const inner = obj[kind];
  switch (kind) {
    case "Option":
      return optionType(parseCLTypeJson(inner, `${path}.Option`));
    case "List":
      return listType(parseCLTypeJson(inner, `${path}.List`));
    case "ByteArray":
      return byteArrayType(asInteger(inner, `${path}.ByteArray`));
    case "Map": {
      const entry = asRecord(inner, `${path}.Map`);
      return mapType(
        parseCLTypeJson(entry["key"], `${path}.Map.key`),
        parseCLTypeJson(entry["value"], `${path}.Map.value`),
      );
    }
    default:
      throw new ValidationError(`${path}: unknown CLType ${kind}`);
  }
}

/**
 * Parse a CLValue from `{ cl_type, bytes, parsed }`
 *
 * The bytes are taken as given; `parsed` is display-only and defaults to null.
 */
export function parseCLValueJson(data: unknown, path: string = "value"): CLValue {
  const obj = asRecord(data, path);
  const parsed = obj["parsed"] ?? null;
  if (!isCLParsed(parsed)) {
    throw new ValidationError(`${path}.parsed: not a JSON value`);
  }
  return {
    clType: parseCLTypeJson(obj["cl_type"], `${path}.cl_type`),
    bytes: hexToBytes(asString(obj["bytes"], `${path}.bytes`)),
    parsed,
  };
}

function parseHeader(data: unknown): DeployHeader {
  const obj = asRecord(data, "header");

  const timestamp = asString(obj["timestamp"], "header.timestamp");
  try {
    timestampToMillis(timestamp);
  } catch (error) {
    if (error instanceof DeployError) {
      throw new ValidationError(`header.timestamp: ${error.message}`, { cause: error });
    }
    throw error;
  }

  return {
    account: asPublicKeyHex(asString(obj["account"], "header.account")),
    timestamp,
    ttl: parseTtl(asString(obj["ttl"], "header.ttl")),
    gasPrice: asInteger(obj["gas_price"], "header.gas_price"),
    bodyHash: asDigest(asString(obj["body_hash"], "header.body_hash")),
    dependencies: asArray(obj["dependencies"], "header.dependencies").map((dep, i) =>
      asDigest(asString(dep, `header.dependencies[${i}]`)),
    ),
    chainName: asString(obj["chain_name"], "header.chain_name"),
  };
}

function parseApproval(data: unknown, path: string): DeployApproval {
  const obj = asRecord(data, path);
  return {
    signer: asPublicKeyHex(asString(obj["signer"], `${path}.signer`)),
    signature: asSignatureHex(asString(obj["signature"], `${path}.signature`)),
  };
}

function parseExecutableDeployItem(data: unknown, path: string): ExecutableDeployItem {
  const obj = asRecord(data, path);
  const keys = Object.keys(obj);
  const variant = keys[0];
  if (keys.length !== 1 || variant === undefined) {
    throw new ValidationError(`${path}: expected a single-key executable item object`);
  }

  const at = `${path}.${variant}`;
  const body = asRecord(obj[variant], at);
  const args = parseRuntimeArgs(body["args"], `${at}.args`);

  switch (variant) {
    case "ModuleBytes":
      return {
        kind: "ModuleBytes",
        moduleBytes: hexToBytes(asString(body["module_bytes"], `${at}.module_bytes`)),
        args,
      };
    case "StoredContractByHash":
      return {
        kind: "StoredContractByHash",
        hash: asDigest(asString(body["hash"], `${at}.hash`)),
        entryPoint: asString(body["entry_point"], `${at}.entry_point`),
        args,
      };
    case "StoredContractByName":
      return {
        kind: "StoredContractByName",
        name: asString(body["name"], `${at}.name`),
        entryPoint: asString(body["entry_point"], `${at}.entry_point`),
        args,
      };
    case "StoredVersionedContractByHash": {
      const version = parseOptionalVersion(body["version"], `${at}.version`);
      return {
        kind: "StoredVersionedContractByHash",
        hash: asDigest(asString(body["hash"], `${at}.hash`)),
        entryPoint: asString(body["entry_point"], `${at}.entry_point`),
        args,
        ...(version !== undefined ? { version } : {}),
      };
    }
    case "StoredVersionedContractByName": {
      const version = parseOptionalVersion(body["version"], `${at}.version`);
      return {
        kind: "StoredVersionedContractByName",
        name: asString(body["name"], `${at}.name`),
        entryPoint: asString(body["entry_point"], `${at}.entry_point`),
        args,
        ...(version !== undefined ? { version } : {}),
      };
    }
    case "Transfer":
      return { kind: "Transfer", args };
    default:
      throw new ValidationError(`${path}: unknown executable item ${variant}`);
  }
}

function parseRuntimeArgs(data: unknown, path: string): RuntimeArgs {
  return asArray(data, path).map((entry, i): RuntimeArg => {
    const at = `${path}[${i}]`;
    const tuple = asArray(entry, at);
    if (tuple.length !== 2) {
      throw new ValidationError(`${at}: expected [name, value]`);
    }
    return {
      name: asString(tuple[0], `${at}[0]`),
      value: parseCLValueJson(tuple[1], `${at}[1]`),
    };
  });
}

function parseOptionalVersion(data: unknown, path: string): number | undefined {
  return data === undefined || data === null ? undefined : asInteger(data, path);
}

// Primitive guards

function asRecord(data: unknown, path: string): Record<string, unknown> {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ValidationError(`${path}: expected an object`);
  }
  return data as Record<string, unknown>;
}

function asArray(data: unknown, path: string): readonly unknown[] {
  if (!Array.isArray(data)) {
    throw new ValidationError(`${path}: expected an array`);
  }
  return data;
}

function asString(data: unknown, path: string): string {
  if (typeof data !== "string") {
    throw new ValidationError(`${path}: expected a string, got ${typeof data}`);
  }
  return data;
}

function asInteger(data: unknown, path: string): number {
  if (typeof data !== "number" || !Number.isSafeInteger(data) || data < 0) {
    throw new ValidationError(`${path}: expected a non-negative integer`);
  }
  return data;
}

function isCLParsed(value: unknown): value is CLParsed {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isCLParsed);
  }
  if (typeof value === "object") {
    return Object.values(value).every(isCLParsed);
  }
  return false;
}
