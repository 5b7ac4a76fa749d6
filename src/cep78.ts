/**
 * Session items for CEP-78 NFT contracts
 *
 * Each helper returns a `StoredContractByHash` call to one entry point of an
 * installed CEP-78 contract. Pair it with a payment and pass both to
 * buildDeploy; nothing here talks to a node.
 */
import { type CLParsed, CLValueBuilder } from "./cl-value.js";
import { ValidationError } from "./errors.js";
import { type StoredContractByHashItem, contractByHashSession, runtimeArgs } from "./executable.js";

/**
 * Suggested payments in motes for each entry point
 */
export const CEP78_PAYMENTS = {
  mint: "10000000000",
  transfer: "3000000000",
  burn: "3000000000",
} as const;

/**
 * Token metadata, either pre-serialized JSON or an object to serialize
 */
export type Cep78Metadata = string | { readonly [key: string]: CLParsed };

export interface Cep78MintOptions {
  /** Contract hash (`hash-` prefix accepted) */
  readonly contractHash: string;
  /** Tagged public key of the new owner */
  readonly owner: string;
  readonly metadata: Cep78Metadata;
}

export interface Cep78TransferOptions {
  readonly contractHash: string;
  readonly tokenId: number | bigint;
  /** Tagged public key of the current owner */
  readonly source: string;
  /** Tagged public key of the new owner */
  readonly target: string;
}

export interface Cep78BurnOptions {
  readonly contractHash: string;
  readonly tokenId: number | bigint;
}

/**
 * `mint(token_owner: PublicKey, token_meta_data: String)`
 *
 * @throws {ValidationError} If the owner is empty
 */
export function cep78MintSession(options: Cep78MintOptions): StoredContractByHashItem {
  if (options.owner.trim() === "") {
    throw new ValidationError("Token owner is required");
  }
  const metadata =
    typeof options.metadata === "string" ? options.metadata : JSON.stringify(options.metadata);

  return contractByHashSession(
    options.contractHash,
    "mint",
    runtimeArgs([
      ["token_owner", CLValueBuilder.publicKey(options.owner)],
      ["token_meta_data", CLValueBuilder.string(metadata)],
    ]),
  );
}

/**
 * `transfer(token_id: U64, source_key: PublicKey, target_key: PublicKey)`
 *
 * @throws {ValidationError} If the target is empty
 */
export function cep78TransferSession(options: Cep78TransferOptions): StoredContractByHashItem {
  if (options.target.trim() === "") {
    throw new ValidationError("Target public key is required");
  }
  return contractByHashSession(
    options.contractHash,
    "transfer",
    runtimeArgs([
      ["token_id", CLValueBuilder.u64(options.tokenId)],
      ["source_key", CLValueBuilder.publicKey(options.source)],
      ["target_key", CLValueBuilder.publicKey(options.target)],
    ]),
  );
}

/**
 * `burn(token_id: U64)`
 */
export function cep78BurnSession(options: Cep78BurnOptions): StoredContractByHashItem {
  return contractByHashSession(
    options.contractHash,
    "burn",
    runtimeArgs([["token_id", CLValueBuilder.u64(options.tokenId)]]),
  );
}
