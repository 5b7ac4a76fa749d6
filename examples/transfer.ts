import {
  DeployBuilder,
  PrivateKeySigner,
  deployToJson,
  signDeploy,
  verifyDeployApprovals,
  type Deploy,
  type KeyAlgorithm,
} from "../src/index.js";

export interface TransferExampleOptions {
  /** Sender private key; a random key is used when omitted */
  readonly privateKey?: string;
  readonly algorithm?: KeyAlgorithm;
  readonly target?: string;
  readonly timestamp?: Date;
}

/**
 * Build, sign and verify a native transfer of 2.5 CSPR
 *
 * Prints the JSON-RPC payload a client would send with `account_put_deploy`.
 */
export function runTransferExample(options: TransferExampleOptions = {}): Deploy {
  console.log("\n=================================");
  console.log("Native transfer example");
  console.log("=================================\n");

  const algorithm = options.algorithm ?? "secp256k1";
  const sender =
    options.privateKey !== undefined
      ? new PrivateKeySigner(options.privateKey, algorithm)
      : PrivateKeySigner.random(algorithm);
  const target = options.target ?? "02" + "a".repeat(66);

  console.log(`Sender:  ${sender.getPublicKey()}`);
  console.log(`Account: ${sender.getAccountHash()}`);
  console.log(`Target:  ${target}\n`);

  const builder = new DeployBuilder()
    .setSender(sender.getPublicKey())
    .setChainName("casper-test")
    .setGasPrice(1)
    .setStandardPayment("100000000")
    .setTransferSession({ target, amount: "2500000000" });
  if (options.timestamp !== undefined) {
    builder.setTimestamp(options.timestamp);
  }

  const unsigned = builder.build();
  console.log(`Built deploy ${unsigned.hash}`);
  console.log(`  Body hash:  ${unsigned.header.bodyHash}`);
  console.log(`  Timestamp:  ${unsigned.header.timestamp}`);
  console.log(`  Approvals:  ${unsigned.approvals.length}\n`);

  const signed = signDeploy(unsigned, sender);
  console.log(`Signed by ${sender.getPublicKey()}`);
  console.log(`  Approvals verify: ${verifyDeployApprovals(signed)}\n`);

  console.log("account_put_deploy params:");
  console.log(JSON.stringify({ deploy: deployToJson(signed) }, null, 2));

  return signed;
}
