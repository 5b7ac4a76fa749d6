import {
  PrivateKeySigner,
  buildDeploy,
  contractByHashSession,
  parseDeployJson,
  runtimeArgs,
  signDeploy,
  standardPayment,
  validateDeploy,
  CLValueBuilder,
  deployToJson,
  type DeployValidationReport,
} from "../src/index.js";

export interface MultisigExampleResult {
  readonly signers: readonly string[];
  readonly report: DeployValidationReport;
}

/**
 * Two keys of different algorithms approve one contract call
 *
 * The deploy travels as JSON between the signers, the way it would between
 * two wallets, and is validated after the round trip.
 */
export function runMultisigExample(contractHash: string = "hash-" + "ab".repeat(32)): MultisigExampleResult {
  console.log("\n=================================");
  console.log("Multi-signature example");
  console.log("=================================\n");

  const alice = PrivateKeySigner.random("ed25519");
  const bob = PrivateKeySigner.random("secp256k1");
  console.log(`Alice (ed25519):   ${alice.getPublicKey()}`);
  console.log(`Bob   (secp256k1): ${bob.getPublicKey()}\n`);

  const deploy = buildDeploy({
    account: alice.getPublicKey(),
    payment: standardPayment("3000000000"),
    session: contractByHashSession(
      contractHash,
      "approve",
      runtimeArgs([
        ["spender", CLValueBuilder.key("account", bob.getAccountHash())],
        ["amount", CLValueBuilder.u256("1000")],
      ]),
    ),
  });
  console.log(`Built deploy ${deploy.hash}`);

  // Alice signs and hands the JSON to Bob
  const fromAlice = JSON.stringify(deployToJson(signDeploy(deploy, alice)));
  const received = parseDeployJson(JSON.parse(fromAlice));
  const cosigned = signDeploy(received, bob);
  console.log(`Approvals: ${cosigned.approvals.length}`);

  const report = validateDeploy(cosigned);
  console.log(`Valid: ${report.valid}`);
  for (const approval of report.approvals) {
    console.log(`  ${approval.signer}: ${approval.valid ? "ok" : "INVALID"}`);
  }

  return { signers: [alice.getPublicKey(), bob.getPublicKey()], report };
}
