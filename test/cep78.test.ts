import { describe, it, expect } from "vitest";
import { CEP78_PAYMENTS, cep78BurnSession, cep78MintSession, cep78TransferSession } from "../src/cep78.js";
import { CLTypes } from "../src/cl-type.js";
import { buildDeploy } from "../src/deploy.js";
import { EncodingError, ValidationError } from "../src/errors.js";
import { standardPayment } from "../src/executable.js";
import { TEST_CONTRACT_HASH, TEST_TARGET } from "./test-config.js";

const OWNER = "01" + "ab".repeat(32);

describe("CEP-78 sessions", () => {
  it("should call mint with owner and metadata", () => {
    const session = cep78MintSession({
      contractHash: "hash-" + TEST_CONTRACT_HASH,
      owner: OWNER,
      metadata: { name: "Sword", image: "ipfs://sword" },
    });
    expect(session.entryPoint).toBe("mint");
    expect(session.hash).toBe(TEST_CONTRACT_HASH);
    expect(session.args.map((a) => [a.name, a.value.clType])).toEqual([
      ["token_owner", CLTypes.PublicKey],
      ["token_meta_data", CLTypes.String],
    ]);
    expect(session.args[1]?.value.parsed).toBe('{"name":"Sword","image":"ipfs://sword"}');
  });

  it("should pass pre-serialized metadata through", () => {
    const session = cep78MintSession({ contractHash: TEST_CONTRACT_HASH, owner: OWNER, metadata: "{}" });
    expect(session.args[1]?.value.parsed).toBe("{}");
  });

  it("should call transfer with token id, source and target", () => {
    const session = cep78TransferSession({
      contractHash: TEST_CONTRACT_HASH,
      tokenId: 7,
      source: OWNER,
      target: TEST_TARGET,
    });
    expect(session.entryPoint).toBe("transfer");
    expect(session.args.map((a) => a.name)).toEqual(["token_id", "source_key", "target_key"]);
    expect(Array.from(session.args[0]?.value.bytes ?? [])).toEqual([7, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("should call burn with a token id", () => {
    const session = cep78BurnSession({ contractHash: TEST_CONTRACT_HASH, tokenId: 3n });
    expect(session.entryPoint).toBe("burn");
    expect(session.args.map((a) => [a.name, a.value.parsed])).toEqual([["token_id", 3]]);
  });

  it("should reject missing owners and targets", () => {
    expect(() => cep78MintSession({ contractHash: TEST_CONTRACT_HASH, owner: "", metadata: "{}" })).toThrow(
      ValidationError,
    );
    expect(() =>
      cep78TransferSession({ contractHash: TEST_CONTRACT_HASH, tokenId: 1, source: OWNER, target: " " }),
    ).toThrow("Target public key is required");
  });

  it("should reject a malformed owner key", () => {
    expect(() => cep78MintSession({ contractHash: TEST_CONTRACT_HASH, owner: "01abcd", metadata: "{}" })).toThrow(
      EncodingError,
    );
  });

  it("should build into a deploy with the suggested payment", () => {
    const deploy = buildDeploy({
      account: OWNER,
      payment: standardPayment(CEP78_PAYMENTS.burn),
      session: cep78BurnSession({ contractHash: TEST_CONTRACT_HASH, tokenId: 1 }),
    });
    expect(deploy.session.kind).toBe("StoredContractByHash");
    expect(deploy.payment.args[0]?.value.parsed).toBe("3000000000");
  });
});
