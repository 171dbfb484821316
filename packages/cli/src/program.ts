import path from "path";
import { Command, InvalidArgumentError } from "commander";
import fsExtra from "fs-extra";
import { GenesisData, generateKeyPair, readJSONMaybeYAML, Transaction } from "@tillchain/core";
import { approve, createWallet, DEFAULT_APPROVAL_POLICY, isApprovalPolicyName, issue, transfer } from "@tillchain/ledger";
import { initChain, readKey, startNodeFromConfig } from "./chain";

function parseApprovalPolicy(value: string) {
  if (!isApprovalPolicyName(value)) {
    throw new InvalidArgumentError("expected any|third-party|registered|third-party-registered");
  }
  return value;
}

function parseUint(value: string): bigint {
  if (!/^(0|[1-9][0-9]*)$/.test(value)) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return BigInt(value);
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("expected a port number");
  }
  return port;
}

async function emitTx(tx: Transaction, out: string | undefined): Promise<void> {
  if (out) {
    await fsExtra.writeJSON(path.resolve(out), tx, { spaces: 2 });
    console.log(`Tx ${tx.id} written to ${out}`);
  } else {
    console.log(JSON.stringify(tx, null, 2));
  }
}

async function postJson(url: string, body: unknown): Promise<unknown> {
  const res = await fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
  return res.json();
}

async function getJson(url: string): Promise<unknown> {
  const res = await fetch(url);
  return res.json();
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("tillchain").description("escrowed currency ledger node");

  program
    .command("start")
    .description("Start a node from config file")
    .requiredOption("-c, --config <path>", "config file path")
    .action(async (opts: { config: string }) => {
      const node = await startNodeFromConfig(opts.config);
      console.log(`Node running for chain ${node.getStatus().chainId}, height ${node.getHeight()}`);
      process.on("SIGINT", () => {
        node
          .stop()
          .then(() => process.exit(0))
          .catch((err) => {
            console.error(err);
            process.exit(1);
          });
      });
    });

  program
    .command("init")
    .description("Initialize a new chain folder")
    .argument("<name>")
    .option("-p, --approval-policy <policy>", "who may approve transfers", parseApprovalPolicy, DEFAULT_APPROVAL_POLICY)
    .option("--api-port <port>", "HTTP API port", parsePort)
    .action(async (name: string, opts: { approvalPolicy: ReturnType<typeof parseApprovalPolicy>; apiPort?: number }) => {
      const dir = path.resolve(process.cwd(), name);
      await initChain(dir, name, { approvalPolicy: opts.approvalPolicy, apiPort: opts.apiPort });
      console.log(`Chain ${name} created at ${dir}`);
    });

  const keysCmd = program.command("keys").description("Key management");
  keysCmd
    .command("gen")
    .description("Generate an ed25519 keypair")
    .requiredOption("--out <dir>", "output directory")
    .option("--name <file>", "key file name", "key.json")
    .action(async (opts: { out: string; name: string }) => {
      const kp = await generateKeyPair();
      await fsExtra.ensureDir(opts.out);
      const outPath = path.join(opts.out, opts.name);
      await fsExtra.writeJSON(outPath, kp, { spaces: 2 });
      console.log(`Key ${kp.pubKey} written to ${outPath}`);
    });

  const genesisCmd = program.command("genesis").description("Genesis utilities");
  genesisCmd
    .command("create")
    .description("Create a genesis file")
    .requiredOption("--chainId <id>", "chain id")
    .requiredOption("--validators <list...>", "validator pub keys")
    .option("-p, --approval-policy <policy>", "who may approve transfers", parseApprovalPolicy, DEFAULT_APPROVAL_POLICY)
    .option("--app <path>", "extra app state json/yaml file")
    .requiredOption("--out <file>", "output file")
    .action(
      async (opts: {
        chainId: string;
        validators: string[];
        approvalPolicy: string;
        app?: string;
        out: string;
      }) => {
        const extra = opts.app ? readJSONMaybeYAML(path.resolve(opts.app)) : {};
        const genesis: GenesisData = {
          chainId: opts.chainId,
          validators: opts.validators.map((pub, idx) => ({ name: `val${idx + 1}`, pubKey: pub })),
          appState: { ...(typeof extra === "object" && extra !== null ? extra : {}), approvalPolicy: opts.approvalPolicy }
        };
        await fsExtra.writeJSON(path.resolve(opts.out), genesis, { spaces: 2 });
        console.log(`Genesis written to ${opts.out}`);
      }
    );

  const txCmd = program.command("tx").description("Build, sign and submit ledger transactions");
  txCmd
    .command("create-wallet")
    .description("Sign a CreateWallet transaction")
    .requiredOption("-k, --key <file>", "signer key file")
    .requiredOption("--name <name>", "wallet name")
    .option("--out <file>", "write tx to file")
    .action(async (opts: { key: string; name: string; out?: string }) => {
      await emitTx(await createWallet(readKey(opts.key), opts.name), opts.out);
    });

  txCmd
    .command("issue")
    .description("Sign an Issue transaction crediting the signer's wallet")
    .requiredOption("-k, --key <file>", "signer key file")
    .requiredOption("--amount <n>", "amount to issue", parseUint)
    .option("--seed <n>", "uniqueness seed", parseUint, 0n)
    .option("--out <file>", "write tx to file")
    .action(async (opts: { key: string; amount: bigint; seed: bigint; out?: string }) => {
      await emitTx(await issue(readKey(opts.key), opts.amount, opts.seed), opts.out);
    });

  txCmd
    .command("transfer")
    .description("Sign a Transfer transaction from the signer's wallet")
    .requiredOption("-k, --key <file>", "signer key file")
    .requiredOption("--to <pubKey>", "receiver public key")
    .requiredOption("--approver <pubKey>", "approver public key")
    .requiredOption("--amount <n>", "amount to transfer", parseUint)
    .option("--seed <n>", "uniqueness seed", parseUint, 0n)
    .option("--out <file>", "write tx to file")
    .action(async (opts: { key: string; to: string; approver: string; amount: bigint; seed: bigint; out?: string }) => {
      const tx = await transfer(readKey(opts.key), {
        to: opts.to,
        approver: opts.approver,
        amount: opts.amount,
        seed: opts.seed
      });
      await emitTx(tx, opts.out);
    });

  txCmd
    .command("approve")
    .description("Sign an Approve transaction for a pending transfer")
    .requiredOption("-k, --key <file>", "approver key file")
    .requiredOption("--transfer <hash>", "hash of the transfer to approve")
    .option("--seed <n>", "uniqueness seed", parseUint, 0n)
    .option("--out <file>", "write tx to file")
    .action(async (opts: { key: string; transfer: string; seed: bigint; out?: string }) => {
      await emitTx(await approve(readKey(opts.key), { transferTxHash: opts.transfer, seed: opts.seed }), opts.out);
    });

  txCmd
    .command("submit")
    .description("Submit a signed transaction file to a node")
    .argument("<file>")
    .option("--node <url>", "node API base url", "http://localhost:26657")
    .action(async (file: string, opts: { node: string }) => {
      const tx = readJSONMaybeYAML(path.resolve(file));
      console.log(JSON.stringify(await postJson(`${opts.node}/tx`, tx), null, 2));
    });

  txCmd
    .command("status")
    .description("Show the execution status of a transaction")
    .argument("<id>")
    .option("--node <url>", "node API base url", "http://localhost:26657")
    .action(async (id: string, opts: { node: string }) => {
      console.log(JSON.stringify(await getJson(`${opts.node}/tx/${id}`), null, 2));
    });

  program
    .command("wallet")
    .description("Show a wallet")
    .argument("<pubKey>")
    .option("--node <url>", "node API base url", "http://localhost:26657")
    .action(async (pubKey: string, opts: { node: string }) => {
      console.log(JSON.stringify(await getJson(`${opts.node}/wallets/${pubKey}`), null, 2));
    });

  return program;
}
