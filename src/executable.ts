/**
 * Executable deploy items (payment and session) and their runtime arguments
 */
import { type CLValue, CLValueBuilder } from "./cl-value.js";
import { CLTypes, serializeCLType } from "./cl-type.js";
import { type BigNumberish, encodeBytes, encodeOptionU32, encodeString, encodeU32 } from "./bytesrepr.js";
import { concatBytes, hexToBytes } from "./crypto/utils.js";
import { EncodingError, ValidationError } from "./errors.js";
import { type Digest, asDigest } from "./types.js";

/**
 * A named argument; serialization preserves insertion order
 */
export interface RuntimeArg {
  readonly name: string;
  readonly value: CLValue;
}

export type RuntimeArgs = readonly RuntimeArg[];

export interface ModuleBytesItem {
  readonly kind: "ModuleBytes";
  readonly moduleBytes: Uint8Array;
  readonly args: RuntimeArgs;
}

export interface StoredContractByHashItem {
  readonly kind: "StoredContractByHash";
  readonly hash: Digest;
  readonly entryPoint: string;
  readonly args: RuntimeArgs;
}

export interface StoredContractByNameItem {
  readonly kind: "StoredContractByName";
  readonly name: string;
  readonly entryPoint: string;
  readonly args: RuntimeArgs;
}

export interface StoredVersionedContractByHashItem {
  readonly kind: "StoredVersionedContractByHash";
  readonly hash: Digest;
  /** Omitted means "latest enabled version" */
  readonly version?: number;
  readonly entryPoint: string;
  readonly args: RuntimeArgs;
}

export interface StoredVersionedContractByNameItem {
  readonly kind: "StoredVersionedContractByName";
  readonly name: string;
  readonly version?: number;
  readonly entryPoint: string;
  readonly args: RuntimeArgs;
}

export interface TransferItem {
  readonly kind: "Transfer";
  readonly args: RuntimeArgs;
}

export type ExecutableDeployItem =
  | ModuleBytesItem
  | StoredContractByHashItem
  | StoredContractByNameItem
  | StoredVersionedContractByHashItem
  | StoredVersionedContractByNameItem
  | TransferItem;

/**
 * Variant tag bytes
 */
export const EXECUTABLE_ITEM_TAGS = {
  ModuleBytes: 0,
  StoredContractByHash: 1,
  StoredContractByName: 2,
  StoredVersionedContractByHash: 3,
  StoredVersionedContractByName: 4,
  Transfer: 5,
} as const satisfies Record<ExecutableDeployItem["kind"], number>;

/**
 * Build an ordered argument list from `[name, value]` pairs
 *
 * @throws {ValidationError} If a name is repeated
 */
export function runtimeArgs(entries: readonly (readonly [string, CLValue])[]): RuntimeArgs {
  const seen = new Set<string>();
  return entries.map(([name, value]) => {
    if (seen.has(name)) {
      throw new ValidationError(`Duplicate runtime argument: ${name}`);
    }
    seen.add(name);
    return { name, value: { ...value, bytes: value.bytes.slice() } };
  });
}

/**
 * Copy an item down to its byte arrays
 */
export function copyExecutableDeployItem(item: ExecutableDeployItem): ExecutableDeployItem {
  const args = item.args.map((arg) => ({ name: arg.name, value: { ...arg.value, bytes: arg.value.bytes.slice() } }));
  if (item.kind === "ModuleBytes") {
    return { ...item, moduleBytes: item.moduleBytes.slice(), args };
  }
  return { ...item, args };
}

/**
 * Serialize arguments as `[u32 count]` then per argument
 * `[u32 len][name][u32 len][value bytes][type descriptor]`
 */
export function serializeRuntimeArgs(args: RuntimeArgs): Uint8Array {
  return concatBytes(
    encodeU32(args.length),
    ...args.map((arg) =>
      concatBytes(
        encodeString(arg.name),
        encodeBytes(arg.value.bytes),
        serializeCLType(arg.value.clType),
      ),
    ),
  );
}

/**
 * Serialize a payment or session item: tag byte followed by the variant fields
 *
 * @throws {EncodingError} If a contract hash is not 32 bytes of hex
 */
export function serializeExecutableDeployItem(item: ExecutableDeployItem): Uint8Array {
  const tag = Uint8Array.of(EXECUTABLE_ITEM_TAGS[item.kind]);

  switch (item.kind) {
    case "ModuleBytes":
      return concatBytes(tag, encodeBytes(item.moduleBytes), serializeRuntimeArgs(item.args));
    case "StoredContractByHash":
      return concatBytes(
        tag,
        contractHashBytes(item.hash),
        encodeString(item.entryPoint),
        serializeRuntimeArgs(item.args),
      );
    case "StoredContractByName":
      return concatBytes(
        tag,
        encodeString(item.name),
        encodeString(item.entryPoint),
        serializeRuntimeArgs(item.args),
      );
    case "StoredVersionedContractByHash":
      return concatBytes(
        tag,
        contractHashBytes(item.hash),
        encodeOptionU32(item.version),
        encodeString(item.entryPoint),
        serializeRuntimeArgs(item.args),
      );
    case "StoredVersionedContractByName":
      return concatBytes(
        tag,
        encodeString(item.name),
        encodeOptionU32(item.version),
        encodeString(item.entryPoint),
        serializeRuntimeArgs(item.args),
      );
    case "Transfer":
      return concatBytes(tag, serializeRuntimeArgs(item.args));
    default: {
      const _exhaustive: never = item;
      throw new EncodingError(`Unknown executable item: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

// Item constructors

/**
 * Standard payment: empty module bytes with a single `amount: U512` argument
 */
export function standardPayment(amount: BigNumberish): ModuleBytesItem {
  return moduleBytesSession(new Uint8Array(0), runtimeArgs([["amount", CLValueBuilder.u512(amount)]]));
}

/**
 * Options for a native transfer
 */
export interface TransferOptions {
  /** Tagged public key of the recipient */
  readonly target: string;
  /** Amount in motes */
  readonly amount: BigNumberish;
  /** Optional transfer id (memo) */
  readonly transferId?: number | bigint;
}

/**
 * Native transfer session with args `amount: U512`, `target: PublicKey`, `id: Option<U64>`
 */
export function transferSession(options: TransferOptions): TransferItem {
  const id =
    options.transferId === undefined
      ? CLValueBuilder.optionNone(CLTypes.U64)
      : CLValueBuilder.option(CLValueBuilder.u64(options.transferId));

  return {
    kind: "Transfer",
    args: runtimeArgs([
      ["amount", CLValueBuilder.u512(options.amount)],
      ["target", CLValueBuilder.publicKey(options.target)],
      ["id", id],
    ]),
  };
}

/**
 * Session that runs compiled WASM
 */
export function moduleBytesSession(moduleBytes: Uint8Array, args: RuntimeArgs = []): ModuleBytesItem {
  return { kind: "ModuleBytes", moduleBytes: moduleBytes.slice(), args };
}

/**
 * Call an entry point of a contract stored under a hash
 */
export function contractByHashSession(
  contractHash: string,
  entryPoint: string,
  args: RuntimeArgs = [],
): StoredContractByHashItem {
  return {
    kind: "StoredContractByHash",
    hash: parseContractHash(contractHash),
    entryPoint: requireEntryPoint(entryPoint),
    args,
  };
}

/**
 * Call an entry point of a contract stored under a named key of the caller's account
 */
export function contractByNameSession(
  name: string,
  entryPoint: string,
  args: RuntimeArgs = [],
): StoredContractByNameItem {
  return {
    kind: "StoredContractByName",
    name: requireName(name),
    entryPoint: requireEntryPoint(entryPoint),
    args,
  };
}

/**
 * Call an entry point of a versioned contract package stored under a hash
 *
 * @param version - Contract version; omit for the latest enabled version
 */
export function versionedContractByHashSession(
  packageHash: string,
  entryPoint: string,
  args: RuntimeArgs = [],
  version?: number,
): StoredVersionedContractByHashItem {
  return {
    kind: "StoredVersionedContractByHash",
    hash: parseContractHash(packageHash),
    entryPoint: requireEntryPoint(entryPoint),
    args,
    ...(version !== undefined ? { version: requireVersion(version) } : {}),
  };
}

/**
 * Call an entry point of a versioned contract package stored under a named key
 */
export function versionedContractByNameSession(
  name: string,
  entryPoint: string,
  args: RuntimeArgs = [],
  version?: number,
): StoredVersionedContractByNameItem {
  return {
    kind: "StoredVersionedContractByName",
    name: requireName(name),
    entryPoint: requireEntryPoint(entryPoint),
    args,
    ...(version !== undefined ? { version: requireVersion(version) } : {}),
  };
}

/**
 * Accepts bare hex or the textual `hash-` / `contract-` / `contract-package-` forms
 */
function parseContractHash(value: string): Digest {
  const hex = value.replace(/^(contract-package-|contract-|hash-)/, "");
  hexToBytes(hex);
  return asDigest(hex);
}

function contractHashBytes(hash: Digest): Uint8Array {
  const bytes = hexToBytes(hash);
  if (bytes.length !== 32) {
    throw new EncodingError(`Contract hash must be 32 bytes, got ${bytes.length}`);
  }
  return bytes;
}

function requireEntryPoint(entryPoint: string): string {
  if (entryPoint.trim() === "") {
    throw new ValidationError("Entry point cannot be empty");
  }
  return entryPoint;
}

function requireName(name: string): string {
  if (name.trim() === "") {
    throw new ValidationError("Contract name cannot be empty");
  }
  return name;
}

function requireVersion(version: number): number {
  if (!Number.isInteger(version) || version < 0 || version > 0xffff_ffff) {
    throw new ValidationError(`Contract version must be a u32, got ${version}`);
  }
  return version;
}
