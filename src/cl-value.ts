/**
 * CLValue construction
 *
 * A CLValue pairs the wire bytes of a value with its CLType descriptor. The
 * `parsed` field is a display rendering only; it never reaches the wire format
 * or any hash.
 */
import {
  type CLType,
  CLTypes,
  byteArrayType,
  clTypeToString,
  clTypesEqual,
  listType,
  mapType,
  optionType,
} from "./cl-type.js";
import {
  type BigNumberish,
  encodeBigUnsigned,
  encodeI32,
  encodeI64,
  encodeString,
  encodeU32,
  encodeU64,
  encodeU8,
  parseUnsigned,
} from "./bytesrepr.js";
import { bytesToHex, concatBytes, hexToBytes } from "./crypto/utils.js";
import { ArgumentError, EncodingError } from "./errors.js";
import { ACCOUNT_HASH_PREFIX, PUBLIC_KEY_LENGTHS } from "./types.js";

/**
 * JSON-compatible display value
 */
export type CLParsed =
  | string
  | number
  | boolean
  | null
  | readonly CLParsed[]
  | { readonly [key: string]: CLParsed };

export interface CLValue {
  readonly clType: CLType;
  readonly bytes: Uint8Array;
  readonly parsed: CLParsed;
}

/**
 * Variants of the `Key` type with their tag byte and expected payload length
 */
export const KEY_VARIANTS = {
  account: { tag: 0x00, length: 32 },
  hash: { tag: 0x01, length: 32 },
  uref: { tag: 0x02, length: 33 },
} as const;

export type KeyVariant = keyof typeof KEY_VARIANTS;

/**
 * Access-rights flags carried in the trailing byte of a URef
 */
export const ACCESS_RIGHTS = {
  NONE: 0x00,
  READ: 0x01,
  WRITE: 0x02,
  ADD: 0x04,
  READ_ADD_WRITE: 0x07,
} as const;

const BIG_UNSIGNED_WIDTHS = { U128: 16, U256: 32, U512: 64 } as const;

function bool(value: boolean): CLValue {
  return { clType: CLTypes.Bool, bytes: Uint8Array.of(value ? 1 : 0), parsed: value };
}

function i32(value: number): CLValue {
  return { clType: CLTypes.I32, bytes: encodeI32(value), parsed: value };
}

function i64(value: number | bigint): CLValue {
  return { clType: CLTypes.I64, bytes: encodeI64(value), parsed: displayInteger(value) };
}

function u8(value: number): CLValue {
  return { clType: CLTypes.U8, bytes: encodeU8(value), parsed: value };
}

function u32(value: number): CLValue {
  return { clType: CLTypes.U32, bytes: encodeU32(value), parsed: value };
}

function u64(value: number | bigint): CLValue {
  return { clType: CLTypes.U64, bytes: encodeU64(value), parsed: displayInteger(value) };
}

function bigUnsigned(kind: keyof typeof BIG_UNSIGNED_WIDTHS, value: BigNumberish): CLValue {
  const bytes = encodeBigUnsigned(value, BIG_UNSIGNED_WIDTHS[kind], kind);
  return { clType: CLTypes[kind], bytes, parsed: parseUnsigned(value, kind).toString() };
}

function u128(value: BigNumberish): CLValue {
  return bigUnsigned("U128", value);
}

function u256(value: BigNumberish): CLValue {
  return bigUnsigned("U256", value);
}

/**
 * U512 is the type of every motes amount (payment, transfer amount)
 */
function u512(value: BigNumberish): CLValue {
  return bigUnsigned("U512", value);
}

function string(value: string): CLValue {
  return { clType: CLTypes.String, bytes: encodeString(value), parsed: value };
}

function unit(): CLValue {
  return { clType: CLTypes.Unit, bytes: new Uint8Array(0), parsed: null };
}

/**
 * Tagged public key; the bytes are the tagged key unchanged
 *
 * @throws {EncodingError} If the hex is malformed or the tag/length do not match
 */
function publicKey(publicKeyHex: string): CLValue {
  const bytes = hexToBytes(publicKeyHex);
  const tag = bytes[0];
  const expected =
    tag === 0x01 ? PUBLIC_KEY_LENGTHS.ed25519 : tag === 0x02 ? PUBLIC_KEY_LENGTHS.secp256k1 : undefined;
  if (expected === undefined) {
    throw new EncodingError(`Unknown public key tag: ${tag === undefined ? "(empty)" : tag}`);
  }
  if (bytes.length !== expected + 1) {
    throw new EncodingError(
      `Public key with tag ${tag} must be ${expected + 1} bytes, got ${bytes.length}`,
    );
  }
  return { clType: CLTypes.PublicKey, bytes, parsed: bytesToHex(bytes) };
}

/**
 * Global-state key: `[variant tag][raw key bytes]`
 *
 * @param variant - `account`, `hash` or `uref` (case-insensitive)
 * @param keyHex - Raw key bytes; 32 for account/hash, 33 (address + access rights) for uref.
 *   An `account-hash-` prefix is accepted for account keys.
 * @throws {ArgumentError} If the variant name is unknown
 * @throws {EncodingError} If the hex is malformed or has the wrong length
 */
function key(variant: string, keyHex: string): CLValue {
  const name = variant.toLowerCase();
  if (!isKeyVariant(name)) {
    throw new ArgumentError(`Unknown key type: ${variant} (expected account, hash or uref)`);
  }

  const { tag, length } = KEY_VARIANTS[name];
  const raw = hexToBytes(stripAccountHashPrefix(keyHex));
  if (raw.length !== length) {
    throw new EncodingError(`${name} key must be ${length} bytes, got ${raw.length}`);
  }

  return {
    clType: CLTypes.Key,
    bytes: concatBytes(Uint8Array.of(tag), raw),
    parsed: formatKey(name, raw),
  };
}

/**
 * Unforgeable reference: `[32-byte address][access-rights byte]`
 *
 * @throws {EncodingError} If the address is not 32 bytes or the rights exceed READ_ADD_WRITE
 */
function uref(urefHex: string, accessRights: number = ACCESS_RIGHTS.READ_ADD_WRITE): CLValue {
  const address = hexToBytes(urefHex);
  if (address.length !== 32) {
    throw new EncodingError(`URef address must be 32 bytes, got ${address.length}`);
  }
  if (!Number.isInteger(accessRights) || accessRights < 0 || accessRights > ACCESS_RIGHTS.READ_ADD_WRITE) {
    throw new EncodingError(`Invalid URef access rights: ${accessRights}`);
  }
  return {
    clType: CLTypes.URef,
    bytes: concatBytes(address, Uint8Array.of(accessRights)),
    parsed: formatURef(address, accessRights),
  };
}

/**
 * Account hash as raw 32 bytes, typed `ByteArray(32)`
 *
 * Accepts `account-hash-<hex>` or bare hex.
 */
function accountHash(accountHashHex: string): CLValue {
  const raw = hexToBytes(stripAccountHashPrefix(accountHashHex));
  if (raw.length !== 32) {
    throw new EncodingError(`Account hash must be 32 bytes, got ${raw.length}`);
  }
  return {
    clType: byteArrayType(32),
    bytes: raw,
    parsed: `${ACCOUNT_HASH_PREFIX}${bytesToHex(raw)}`,
  };
}

/**
 * `Some(value)`: `[0x01][value bytes]`
 */
function option(value: CLValue): CLValue {
  return {
    clType: optionType(value.clType),
    bytes: concatBytes(Uint8Array.of(1), value.bytes),
    parsed: value.parsed,
  };
}

/**
 * `None`: `[0x00]`; the inner type is still part of the descriptor
 */
function optionNone(innerType: CLType): CLValue {
  return { clType: optionType(innerType), bytes: Uint8Array.of(0), parsed: null };
}

/**
 * Homogeneous list: `[u32 count][element bytes...]`
 *
 * @param values - Elements, all of the same CLType
 * @param elementType - Required when the list is empty
 * @throws {EncodingError} If the element type cannot be determined or elements differ in type
 */
function list(values: readonly CLValue[], elementType?: CLType): CLValue {
  const inner = elementType ?? values[0]?.clType;
  if (inner === undefined) {
    throw new EncodingError("Cannot infer element type of an empty list; pass elementType");
  }
  assertAllOfType(values.map((v) => v.clType), inner, "List element");

  return {
    clType: listType(inner),
    bytes: concatBytes(encodeU32(values.length), ...values.map((v) => v.bytes)),
    parsed: values.map((v) => v.parsed),
  };
}

/**
 * Fixed-size byte array; the size lives in the descriptor, not in the bytes
 */
function byteArray(bytes: Uint8Array): CLValue {
  return { clType: byteArrayType(bytes.length), bytes: bytes.slice(), parsed: bytesToHex(bytes) };
}

/**
 * Map: `[u32 count][k0][v0][k1][v1]...` in the order given
 *
 * @throws {EncodingError} If a key or value does not match the declared types
 */
function map(
  entries: readonly (readonly [CLValue, CLValue])[],
  keyType: CLType,
  valueType: CLType,
): CLValue {
  assertAllOfType(entries.map(([k]) => k.clType), keyType, "Map key");
  assertAllOfType(entries.map(([, v]) => v.clType), valueType, "Map value");

  return {
    clType: mapType(keyType, valueType),
    bytes: concatBytes(encodeU32(entries.length), ...entries.flatMap(([k, v]) => [k.bytes, v.bytes])),
    parsed: entries.map(([k, v]) => ({ key: k.parsed, value: v.parsed })),
  };
}

/**
 * Constructors for every supported CLValue
 *
 * @example
 * ```typescript
 * const amount = CLValueBuilder.u512("2500000000");
 * const id = CLValueBuilder.option(CLValueBuilder.u64(7));
 * ```
 */
export const CLValueBuilder = {
  bool,
  i32,
  i64,
  u8,
  u32,
  u64,
  u128,
  u256,
  u512,
  string,
  unit,
  publicKey,
  key,
  uref,
  accountHash,
  option,
  optionNone,
  list,
  byteArray,
  map,
} as const;

export function isKeyVariant(value: string): value is KeyVariant {
  return Object.prototype.hasOwnProperty.call(KEY_VARIANTS, value);
}

function assertAllOfType(types: readonly CLType[], expected: CLType, label: string): void {
  types.forEach((type, index) => {
    if (!clTypesEqual(type, expected)) {
      throw new EncodingError(
        `${label} ${index} has type ${clTypeToString(type)}, expected ${clTypeToString(expected)}`,
      );
    }
  });
}

function stripAccountHashPrefix(value: string): string {
  return value.startsWith(ACCOUNT_HASH_PREFIX) ? value.slice(ACCOUNT_HASH_PREFIX.length) : value;
}

function formatKey(variant: KeyVariant, raw: Uint8Array): string {
  switch (variant) {
    case "account":
      return `${ACCOUNT_HASH_PREFIX}${bytesToHex(raw)}`;
    case "hash":
      return `hash-${bytesToHex(raw)}`;
    case "uref":
      return formatURef(raw.subarray(0, 32), raw[32] ?? 0);
  }
}

function formatURef(address: Uint8Array, accessRights: number): string {
  return `uref-${bytesToHex(address)}-${accessRights.toString(8).padStart(3, "0")}`;
}

/**
 * Numbers outside the safe range are displayed as decimal strings
 */
function displayInteger(value: number | bigint): number | string {
  if (typeof value === "number") {
    return value;
  }
  if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  return value.toString();
}
