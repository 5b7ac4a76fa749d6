import { describe, it, expect } from "vitest";
import { CLValueBuilder } from "../src/cl-value.js";
import {
  DEPLOY_DEFAULTS,
  DeployBuilder,
  buildDeploy,
  computeBodyHash,
  computeDeployHash,
  serializeDeployHeader,
  type DeployParams,
} from "../src/deploy.js";
import { EncodingError, ValidationError } from "../src/errors.js";
import {
  type ExecutableDeployItem,
  contractByHashSession,
  runtimeArgs,
  standardPayment,
  transferSession,
} from "../src/executable.js";
import { blake2b256Hex } from "../src/crypto/utils.js";
import { TEST_CONTRACT_HASH, TEST_TARGET, TEST_TIMESTAMP, TEST_TIMESTAMP_ISO } from "./test-config.js";

const ACCOUNT = "01" + "ab".repeat(32);

// Independently computed Blake2b-256 values for the transfer below
const EXPECTED_BODY_HASH = "8db58df96e05011b2fa492e02d58a6c8445e068b26ca07c6795479b7228764cc";
const EXPECTED_DEPLOY_HASH = "8328c02668150f27d98267dbae827d746a88173e08d04ee4b9d5839336e29938";

function transferParams(overrides: Partial<DeployParams> = {}): DeployParams {
  return {
    account: ACCOUNT,
    payment: standardPayment("100000000"),
    session: transferSession({ target: TEST_TARGET, amount: "2500000000" }),
    timestamp: TEST_TIMESTAMP,
    ...overrides,
  };
}

describe("Blake2b-256", () => {
  it("should hash empty input to the known digest", () => {
    expect(blake2b256Hex(new Uint8Array(0))).toBe(
      "0e5751c026e543b2e8ab2eb06099daa1d1e5df47778f7787faab45cdf12fe3a8",
    );
  });
});

describe("buildDeploy", () => {
  it("should compute the expected body hash and deploy hash", () => {
    const deploy = buildDeploy(transferParams());
    expect(deploy.header.bodyHash).toBe(EXPECTED_BODY_HASH);
    expect(deploy.hash).toBe(EXPECTED_DEPLOY_HASH);
  });

  it("should apply the defaults", () => {
    const { header, approvals } = buildDeploy(transferParams());
    expect(header.chainName).toBe(DEPLOY_DEFAULTS.chainName);
    expect(header.gasPrice).toBe(1);
    expect(header.ttl).toBe(1_800_000);
    expect(header.dependencies).toEqual([]);
    expect(approvals).toEqual([]);
  });

  it("should subtract the clock skew from a pinned timestamp", () => {
    expect(buildDeploy(transferParams()).header.timestamp).toBe(TEST_TIMESTAMP_ISO);
  });

  it("should honor a custom skew", () => {
    const deploy = buildDeploy(transferParams(), { timestampSkewMs: 0 });
    expect(deploy.header.timestamp).toBe("2024-01-01T00:00:30.000Z");
  });

  it("should accept a Date as the timestamp", () => {
    const fromDate = buildDeploy(transferParams({ timestamp: new Date(TEST_TIMESTAMP) }));
    expect(fromDate.hash).toBe(EXPECTED_DEPLOY_HASH);
  });

  it("should stamp the current time when none is pinned", () => {
    const before = Date.now();
    const deploy = buildDeploy({ ...transferParams(), timestamp: undefined });
    const stamped = Date.parse(deploy.header.timestamp);
    expect(stamped).toBeGreaterThanOrEqual(before - 30_000);
    expect(stamped).toBeLessThanOrEqual(Date.now() - 30_000);
    expect(deploy.header.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("should be deterministic for identical inputs", () => {
    const a = buildDeploy(transferParams());
    const b = buildDeploy(transferParams());
    expect(a.hash).toBe(b.hash);
    expect(serializeDeployHeader(a.header)).toEqual(serializeDeployHeader(b.header));
  });

  it("should fall back to the defaults for options passed as undefined", () => {
    const deploy = buildDeploy(transferParams(), {
      chainName: undefined,
      gasPrice: undefined,
      ttl: undefined,
      timestampSkewMs: undefined,
    });
    expect(deploy.hash).toBe(EXPECTED_DEPLOY_HASH);
  });

  it("should keep its body hash when the caller's byte arrays change later", () => {
    const amount = CLValueBuilder.u512("100000000");
    const moduleBytes = Uint8Array.of(0, 97, 115, 109);
    const payment: ExecutableDeployItem = {
      kind: "ModuleBytes",
      moduleBytes,
      args: [{ name: "amount", value: amount }],
    };
    const deploy = buildDeploy(transferParams({ payment }));

    amount.bytes[1] = 0xff;
    moduleBytes.fill(0);

    expect(computeBodyHash(deploy.payment, deploy.session)).toBe(deploy.header.bodyHash);
    expect(deploy.payment.args[0]?.value.bytes[1]).not.toBe(0xff);
  });

  it("should normalize the account to lowercase", () => {
    const deploy = buildDeploy(transferParams({ account: ACCOUNT.toUpperCase() }));
    expect(deploy.header.account).toBe(ACCOUNT);
    expect(deploy.hash).toBe(EXPECTED_DEPLOY_HASH);
  });

  describe("hash sensitivity", () => {
    const baseline = buildDeploy(transferParams());

    it("should change with the chain name", () => {
      expect(buildDeploy(transferParams(), { chainName: "casper" }).hash).not.toBe(baseline.hash);
    });

    it("should change with the gas price", () => {
      expect(buildDeploy(transferParams(), { gasPrice: 2 }).hash).not.toBe(baseline.hash);
    });

    it("should change with the ttl", () => {
      expect(buildDeploy(transferParams(), { ttl: 3_600_000 }).hash).not.toBe(baseline.hash);
    });

    it("should change with the timestamp", () => {
      expect(buildDeploy(transferParams({ timestamp: TEST_TIMESTAMP + 1 })).hash).not.toBe(baseline.hash);
    });

    it("should change with dependencies", () => {
      const withDep = buildDeploy(transferParams({ dependencies: ["ee".repeat(32)] }));
      expect(withDep.hash).not.toBe(baseline.hash);
      expect(withDep.header.bodyHash).toBe(baseline.header.bodyHash);
    });

    it("should change body hash and deploy hash with an argument byte", () => {
      const other = buildDeploy(
        transferParams({ session: transferSession({ target: TEST_TARGET, amount: "2500000001" }) }),
      );
      expect(other.header.bodyHash).not.toBe(baseline.header.bodyHash);
      expect(other.hash).not.toBe(baseline.hash);
    });
  });

  describe("validation", () => {
    it("should name a missing sender", () => {
      expect(() => buildDeploy(transferParams({ account: undefined }))).toThrow("Sender public key is required");
      expect(() => buildDeploy(transferParams({ account: "" }))).toThrow(ValidationError);
    });

    it("should name a missing payment", () => {
      expect(() => buildDeploy(transferParams({ payment: undefined }))).toThrow("Payment is required");
    });

    it("should name a missing session", () => {
      expect(() => buildDeploy(transferParams({ session: undefined }))).toThrow("Session is required");
    });

    it("should raise EncodingError for malformed account hex", () => {
      expect(() => buildDeploy(transferParams({ account: "01zz" }))).toThrow(EncodingError);
    });

    it("should raise ValidationError for an account with the wrong length", () => {
      expect(() => buildDeploy(transferParams({ account: "01abcd" }))).toThrow(ValidationError);
    });

    it("should reject non-positive gas price and ttl", () => {
      expect(() => buildDeploy(transferParams(), { gasPrice: 0 })).toThrow("Gas price must be a positive integer");
      expect(() => buildDeploy(transferParams(), { ttl: -1 })).toThrow("TTL must be a positive integer");
      expect(() => buildDeploy(transferParams(), { gasPrice: 1.5 })).toThrow(ValidationError);
    });

    it("should reject an empty chain name", () => {
      expect(() => buildDeploy(transferParams(), { chainName: "  " })).toThrow("Chain name cannot be empty");
    });

    it("should reject malformed dependencies", () => {
      expect(() => buildDeploy(transferParams({ dependencies: ["ee".repeat(31)] }))).toThrow(ValidationError);
      expect(() => buildDeploy(transferParams({ dependencies: ["e"] }))).toThrow(EncodingError);
    });

    it("should reject an invalid date", () => {
      expect(() => buildDeploy(transferParams({ timestamp: new Date("not a date") }))).toThrow(ValidationError);
    });

    it("should reject timestamps a Date cannot hold", () => {
      expect(() => buildDeploy(transferParams({ timestamp: 8.64e15 + 40_000 }))).toThrow(ValidationError);
      expect(() => buildDeploy(transferParams({ timestamp: 10_000 }))).toThrow("Timestamp is out of range");
    });

    it("should accept the latest representable timestamp", () => {
      const deploy = buildDeploy(transferParams({ timestamp: 8.64e15 }), { timestampSkewMs: 0 });
      expect(deploy.header.timestamp).toBe("+275760-09-13T00:00:00.000Z");
    });
  });
});

describe("Header serialization", () => {
  it("should lay out fields in order", () => {
    const { header } = buildDeploy(transferParams());
    const bytes = serializeDeployHeader(header);

    // 33 account + 3 * 8 + 32 body hash + 4 deps + 4 + 11 chain name
    expect(bytes).toHaveLength(108);
    expect(bytes[0]).toBe(1);
    expect(Array.from(bytes.subarray(33, 41))).toEqual([0, 244, 81, 194, 140, 1, 0, 0]);
    expect(Array.from(bytes.subarray(41, 49))).toEqual([64, 119, 27, 0, 0, 0, 0, 0]);
    expect(Array.from(bytes.subarray(49, 57))).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
    expect(Array.from(bytes.subarray(89, 93))).toEqual([0, 0, 0, 0]);
    expect(new TextDecoder().decode(bytes.subarray(97))).toBe("casper-test");
  });

  it("should append each dependency after its count", () => {
    const { header } = buildDeploy(transferParams({ dependencies: ["ee".repeat(32), "ff".repeat(32)] }));
    const bytes = serializeDeployHeader(header);
    expect(bytes).toHaveLength(108 + 64);
    expect(Array.from(bytes.subarray(89, 93))).toEqual([2, 0, 0, 0]);
    expect(bytes[93]).toBe(0xee);
    expect(bytes[125]).toBe(0xff);
  });

  it("should derive the deploy hash from the header alone", () => {
    const deploy = buildDeploy(transferParams());
    expect(computeDeployHash(deploy.header)).toBe(deploy.hash);
    expect(computeBodyHash(deploy.payment, deploy.session)).toBe(deploy.header.bodyHash);
  });
});

describe("DeployBuilder", () => {
  it("should produce the same deploy as buildDeploy", () => {
    const deploy = new DeployBuilder()
      .setSender(ACCOUNT)
      .setStandardPayment("100000000")
      .setTransferSession({ target: TEST_TARGET, amount: "2500000000" })
      .setTimestamp(TEST_TIMESTAMP)
      .build();
    expect(deploy.hash).toBe(EXPECTED_DEPLOY_HASH);
  });

  it("should carry chain name, gas price, ttl and dependencies", () => {
    const deploy = new DeployBuilder()
      .setSender(ACCOUNT)
      .setChainName("casper")
      .setGasPrice(3)
      .setTtl(60_000)
      .setDependencies(["ee".repeat(32)])
      .setStandardPayment(1)
      .setContractSession(
        TEST_CONTRACT_HASH,
        "mint",
        runtimeArgs([["count", CLValueBuilder.u32(1)]]),
      )
      .setTimestamp(TEST_TIMESTAMP)
      .build();

    expect(deploy.header).toMatchObject({
      chainName: "casper",
      gasPrice: 3,
      ttl: 60_000,
      dependencies: ["ee".repeat(32)],
    });
    expect(deploy.session).toEqual(
      contractByHashSession(TEST_CONTRACT_HASH, "mint", runtimeArgs([["count", CLValueBuilder.u32(1)]])),
    );
  });

  it("should build a wasm session", () => {
    const deploy = new DeployBuilder()
      .setSender(ACCOUNT)
      .setStandardPayment(1)
      .setWasmSession(Uint8Array.of(0, 0x61, 0x73, 0x6d))
      .build();
    expect(deploy.session.kind).toBe("ModuleBytes");
  });

  it("should reject bad settings as they are made", () => {
    expect(() => new DeployBuilder().setSender("")).toThrow(ValidationError);
    expect(() => new DeployBuilder().setGasPrice(0)).toThrow(ValidationError);
    expect(() => new DeployBuilder().setTtl(0)).toThrow(ValidationError);
    expect(() => new DeployBuilder().setChainName("")).toThrow(ValidationError);
  });

  it("should report the first missing field on build", () => {
    expect(() => new DeployBuilder().build()).toThrow("Sender public key is required");
    expect(() => new DeployBuilder().setSender(ACCOUNT).build()).toThrow("Payment is required");
    expect(() => new DeployBuilder().setSender(ACCOUNT).setStandardPayment(1).build()).toThrow(
      "Session is required",
    );
  });
});
