import { describe, it, expect } from "vitest";
import { signDeploy } from "../src/approvals.js";
import { CLTypes, byteArrayType, listType, mapType, optionType } from "../src/cl-type.js";
import { CLValueBuilder } from "../src/cl-value.js";
import { PrivateKeySigner } from "../src/crypto/signer.js";
import { buildDeploy, type Deploy } from "../src/deploy.js";
import { EncodingError, ValidationError } from "../src/errors.js";
import {
  contractByNameSession,
  moduleBytesSession,
  runtimeArgs,
  standardPayment,
  transferSession,
  versionedContractByHashSession,
  versionedContractByNameSession,
} from "../src/executable.js";
import { clValueToJson, deployToJson, formatTtl, parseTtl } from "../src/json.js";
import { parseCLTypeJson, parseDeployJson } from "../src/parsers.js";
import { TEST_CONTRACT_HASH, TEST_ED25519_KEY, TEST_TARGET, TEST_TIMESTAMP, TEST_TIMESTAMP_ISO } from "./test-config.js";

const signer = new PrivateKeySigner(TEST_ED25519_KEY, "ed25519");

function signedTransfer(): Deploy {
  const deploy = buildDeploy({
    account: signer.getPublicKey(),
    payment: standardPayment("100000000"),
    session: transferSession({ target: TEST_TARGET, amount: "2500000000", transferId: 42 }),
    timestamp: TEST_TIMESTAMP,
  });
  return signDeploy(deploy, signer);
}

/** What a deploy looks like after a trip through a JSON transport */
function overTheWire(deploy: Deploy): unknown {
  return JSON.parse(JSON.stringify(deployToJson(deploy)));
}

describe("deployToJson", () => {
  it("should render the header with snake_case keys and a duration ttl", () => {
    const json = deployToJson(signedTransfer());
    expect(json.header).toEqual({
      account: signer.getPublicKey(),
      timestamp: TEST_TIMESTAMP_ISO,
      ttl: "30m",
      gas_price: 1,
      body_hash: json.header.body_hash,
      dependencies: [],
      chain_name: "casper-test",
    });
    expect(json.header.body_hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should render items as single-key variant objects", () => {
    const json = deployToJson(signedTransfer());
    expect(Object.keys(json.payment)).toEqual(["ModuleBytes"]);
    expect(Object.keys(json.session)).toEqual(["Transfer"]);
    expect(json.payment).toEqual({
      ModuleBytes: {
        module_bytes: "",
        args: [["amount", { cl_type: "U512", bytes: "0400e1f505", parsed: "100000000" }]],
      },
    });
  });

  it("should render args as name/value tuples", () => {
    const json = deployToJson(signedTransfer());
    expect(json.session).toEqual({
      Transfer: {
        args: [
          ["amount", { cl_type: "U512", bytes: "0400f90295", parsed: "2500000000" }],
          ["target", { cl_type: "PublicKey", bytes: TEST_TARGET, parsed: TEST_TARGET }],
          ["id", { cl_type: { Option: "U64" }, bytes: "012a00000000000000", parsed: 42 }],
        ],
      },
    });
  });

  it("should render approvals", () => {
    const deploy = signedTransfer();
    expect(deployToJson(deploy).approvals).toEqual([
      { signer: signer.getPublicKey(), signature: deploy.approvals[0]?.signature },
    ]);
  });

  it("should render versions as null when absent", () => {
    const json = deployToJson({
      ...signedTransfer(),
      session: versionedContractByNameSession("counter", "inc"),
    });
    expect(json.session).toEqual({
      StoredVersionedContractByName: { name: "counter", version: null, entry_point: "inc", args: [] },
    });
  });

  it("should render a CLValue", () => {
    expect(clValueToJson(CLValueBuilder.bool(true))).toEqual({ cl_type: "Bool", bytes: "01", parsed: true });
  });
});

describe("parseDeployJson", () => {
  it("should restore a deploy with identical hashes", () => {
    const deploy = signedTransfer();
    const parsed = parseDeployJson(overTheWire(deploy));
    expect(parsed.hash).toBe(deploy.hash);
    expect(parsed.header).toEqual(deploy.header);
    expect(parsed.approvals).toEqual(deploy.approvals);
  });

  it("should restore items exactly", () => {
    const deploy = signedTransfer();
    const parsed = parseDeployJson(overTheWire(deploy));
    expect(parsed.payment).toEqual(deploy.payment);
    expect(parsed.session).toEqual(deploy.session);
  });

  it.each([
    ["module bytes", moduleBytesSession(Uint8Array.of(0, 0x61, 0x73, 0x6d), runtimeArgs([["n", CLValueBuilder.u32(9)]]))],
    ["contract by name", contractByNameSession("faucet", "call")],
    ["versioned by hash", versionedContractByHashSession(TEST_CONTRACT_HASH, "call", [], 3)],
    ["versioned by name", versionedContractByNameSession("faucet", "call")],
  ])("should round-trip a %s session", (_label, session) => {
    const deploy = { ...signedTransfer(), session };
    expect(parseDeployJson(overTheWire(deploy)).session).toEqual(session);
  });

  it("should restore composite argument types", () => {
    const session = contractByNameSession(
      "registry",
      "set",
      runtimeArgs([
        ["tags", CLValueBuilder.list([CLValueBuilder.string("a")])],
        ["owner", CLValueBuilder.accountHash("ab".repeat(32))],
        [
          "limits",
          CLValueBuilder.map([[CLValueBuilder.string("daily"), CLValueBuilder.u512(5)]], CLTypes.String, CLTypes.U512),
        ],
      ]),
    );
    const parsed = parseDeployJson(overTheWire({ ...signedTransfer(), session }));
    expect(parsed.session.args.map((a) => a.value.clType)).toEqual([
      listType(CLTypes.String),
      byteArrayType(32),
      mapType(CLTypes.String, CLTypes.U512),
    ]);
  });

  it("should reject a non-object", () => {
    expect(() => parseDeployJson("deploy")).toThrow("deploy: expected an object");
    expect(() => parseDeployJson(null)).toThrow(ValidationError);
  });

  it("should name a missing field", () => {
    const json = { ...deployToJson(signedTransfer()), hash: undefined };
    expect(() => parseDeployJson(json)).toThrow("hash: expected a string, got undefined");
  });

  it("should reject an unknown executable variant", () => {
    const json = { ...deployToJson(signedTransfer()), session: { Teleport: { args: [] } } };
    expect(() => parseDeployJson(json)).toThrow("session: unknown executable item Teleport");
  });

  it("should reject malformed arg tuples", () => {
    const json = { ...deployToJson(signedTransfer()), session: { Transfer: { args: [["amount"]] } } };
    expect(() => parseDeployJson(json)).toThrow("session.Transfer.args[0]: expected [name, value]");
  });

  it("should reject malformed hex in value bytes", () => {
    const json = {
      ...deployToJson(signedTransfer()),
      session: { Transfer: { args: [["amount", { cl_type: "U512", bytes: "0g", parsed: "1" }]] } },
    };
    expect(() => parseDeployJson(json)).toThrow(EncodingError);
  });

  it("should reject a bad timestamp and ttl", () => {
    const json = deployToJson(signedTransfer());
    expect(() => parseDeployJson({ ...json, header: { ...json.header, timestamp: "yesterday" } })).toThrow(
      ValidationError,
    );
    expect(() => parseDeployJson({ ...json, header: { ...json.header, ttl: "30 minutes" } })).toThrow(
      "Invalid TTL: 30 minutes",
    );
  });
});

describe("parseCLTypeJson", () => {
  it("should parse simple and nested types", () => {
    expect(parseCLTypeJson("U64")).toEqual(CLTypes.U64);
    expect(parseCLTypeJson({ Option: { List: "Key" } })).toEqual(optionType(listType(CLTypes.Key)));
    expect(parseCLTypeJson({ ByteArray: 32 })).toEqual(byteArrayType(32));
  });

  it("should reject unknown names instead of falling back", () => {
    expect(() => parseCLTypeJson("Any")).toThrow("cl_type: unknown CLType Any");
    expect(() => parseCLTypeJson({ Tuple2: ["U8", "U8"] })).toThrow(ValidationError);
    expect(() => parseCLTypeJson({ Option: "U8", List: "U8" })).toThrow(ValidationError);
  });
});

describe("TTL durations", () => {
  it.each([
    [1_800_000, "30m"],
    [5_400_000, "1h 30m"],
    [86_400_000, "1d"],
    [90_061_001, "1d 1h 1m 1s 1ms"],
    [0, "0ms"],
  ])("should format %d ms as %s", (ms, text) => {
    expect(formatTtl(ms)).toBe(text);
    expect(parseTtl(text)).toBe(ms);
  });

  it("should reject unknown units", () => {
    expect(() => parseTtl("2w")).toThrow(ValidationError);
    expect(() => parseTtl("")).toThrow(ValidationError);
  });

  it("should reject negative durations", () => {
    expect(() => formatTtl(-1)).toThrow(ValidationError);
  });
});
