/**
 * CLType descriptors: the network's runtime type system for contract arguments
 *
 * A descriptor is a tagged union. Composite types nest further descriptors, so
 * serialization and rendering recurse. There is no string form to parse and no
 * fallback type: an unrepresentable descriptor cannot be constructed.
 */
import { concatBytes } from "./crypto/utils.js";
import { encodeU32 } from "./bytesrepr.js";
import { EncodingError } from "./errors.js";

/**
 * Names of the non-composite CLTypes
 */
export type SimpleCLTypeName =
  | "Bool"
  | "I32"
  | "I64"
  | "U8"
  | "U32"
  | "U64"
  | "U128"
  | "U256"
  | "U512"
  | "Unit"
  | "String"
  | "Key"
  | "URef"
  | "PublicKey";

export interface SimpleCLType {
  readonly kind: SimpleCLTypeName;
}

export interface OptionCLType {
  readonly kind: "Option";
  readonly inner: CLType;
}

export interface ListCLType {
  readonly kind: "List";
  readonly inner: CLType;
}

export interface ByteArrayCLType {
  readonly kind: "ByteArray";
  readonly size: number;
}

export interface MapCLType {
  readonly kind: "Map";
  readonly key: CLType;
  readonly value: CLType;
}

export type CLType = SimpleCLType | OptionCLType | ListCLType | ByteArrayCLType | MapCLType;

/**
 * Descriptor tag bytes
 */
export const CL_TYPE_TAGS = {
  Bool: 0,
  I32: 1,
  I64: 2,
  U8: 3,
  U32: 4,
  U64: 5,
  U128: 6,
  U256: 7,
  U512: 8,
  Unit: 9,
  String: 10,
  Key: 11,
  URef: 12,
  Option: 13,
  List: 14,
  ByteArray: 15,
  Map: 17,
  PublicKey: 22,
} as const satisfies Record<CLType["kind"], number>;

/**
 * Ready-made descriptors for every simple type
 */
export const CLTypes = {
  Bool: { kind: "Bool" },
  I32: { kind: "I32" },
  I64: { kind: "I64" },
  U8: { kind: "U8" },
  U32: { kind: "U32" },
  U64: { kind: "U64" },
  U128: { kind: "U128" },
  U256: { kind: "U256" },
  U512: { kind: "U512" },
  Unit: { kind: "Unit" },
  String: { kind: "String" },
  Key: { kind: "Key" },
  URef: { kind: "URef" },
  PublicKey: { kind: "PublicKey" },
} as const satisfies { readonly [K in SimpleCLTypeName]: SimpleCLType & { readonly kind: K } };

const SIMPLE_TYPE_NAMES: ReadonlySet<string> = new Set(Object.keys(CLTypes));

export function isSimpleCLTypeName(value: string): value is SimpleCLTypeName {
  return SIMPLE_TYPE_NAMES.has(value);
}

export function optionType(inner: CLType): OptionCLType {
  return { kind: "Option", inner };
}

export function listType(inner: CLType): ListCLType {
  return { kind: "List", inner };
}

/**
 * @throws {EncodingError} If size is not a u32
 */
export function byteArrayType(size: number): ByteArrayCLType {
  if (!Number.isInteger(size) || size < 0 || size > 0xffff_ffff) {
    throw new EncodingError(`ByteArray size must be a u32, got ${size}`);
  }
  return { kind: "ByteArray", size };
}

export function mapType(key: CLType, value: CLType): MapCLType {
  return { kind: "Map", key, value };
}

/**
 * Serialize a descriptor to its self-delimiting byte form
 *
 * Simple types are a single tag byte. Option/List append the inner descriptor,
 * ByteArray appends its size as u32 LE and Map appends key then value descriptors.
 */
export function serializeCLType(type: CLType): Uint8Array {
  switch (type.kind) {
    case "Option":
      return concatBytes(Uint8Array.of(CL_TYPE_TAGS.Option), serializeCLType(type.inner));
    case "List":
      return concatBytes(Uint8Array.of(CL_TYPE_TAGS.List), serializeCLType(type.inner));
    case "ByteArray":
      return concatBytes(Uint8Array.of(CL_TYPE_TAGS.ByteArray), encodeU32(type.size));
    case "Map":
      return concatBytes(
        Uint8Array.of(CL_TYPE_TAGS.Map),
        serializeCLType(type.key),
        serializeCLType(type.value),
      );
    default:
      return Uint8Array.of(CL_TYPE_TAGS[type.kind]);
  }
}

/**
 * Human-readable form, e.g. `Option(U64)` or `Map(String, U512)`
 */
export function clTypeToString(type: CLType): string {
  switch (type.kind) {
    case "Option":
      return `Option(${clTypeToString(type.inner)})`;
    case "List":
      return `List(${clTypeToString(type.inner)})`;
    case "ByteArray":
      return `ByteArray(${type.size})`;
    case "Map":
      return `Map(${clTypeToString(type.key)}, ${clTypeToString(type.value)})`;
    default:
      return type.kind;
  }
}

/**
 * JSON rendering of a descriptor as used by the JSON-RPC API
 */
export type CLTypeJson =
  | SimpleCLTypeName
  | { readonly Option: CLTypeJson }
  | { readonly List: CLTypeJson }
  | { readonly ByteArray: number }
  | { readonly Map: { readonly key: CLTypeJson; readonly value: CLTypeJson } };

export function clTypeToJson(type: CLType): CLTypeJson {
  switch (type.kind) {
    case "Option":
      return { Option: clTypeToJson(type.inner) };
    case "List":
      return { List: clTypeToJson(type.inner) };
    case "ByteArray":
      return { ByteArray: type.size };
    case "Map":
      return { Map: { key: clTypeToJson(type.key), value: clTypeToJson(type.value) } };
    default:
      return type.kind;
  }
}

/**
 * Structural equality of two descriptors
 */
export function clTypesEqual(a: CLType, b: CLType): boolean {
  switch (a.kind) {
    case "Option":
    case "List":
      return (b.kind === "Option" || b.kind === "List") &&
        b.kind === a.kind &&
        clTypesEqual(a.inner, b.inner);
    case "ByteArray":
      return b.kind === "ByteArray" && a.size === b.size;
    case "Map":
      return b.kind === "Map" && clTypesEqual(a.key, b.key) && clTypesEqual(a.value, b.value);
    default:
      return a.kind === b.kind;
  }
}
