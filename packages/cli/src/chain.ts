import path from "path";
import fsExtra from "fs-extra";
import {
  ChainNode,
  GenesisData,
  genesisSchema,
  generateKeyPair,
  getLogger,
  loadConfigFile,
  NodeConfigFile,
  NodeKey,
  nodeKeySchema,
  parseWith,
  readJSONMaybeYAML,
  SequencerConfig
} from "@tillchain/core";
import { ApprovalPolicyName, createLedgerRouter, createLedgerStateMachine, LedgerStore } from "@tillchain/ledger";
import { createSequencer } from "@tillchain/sequencer";
import { LevelBlockStore } from "@tillchain/storage-level";

export const DEFAULT_API_PORT = 26657;

export function readKey(file: string): NodeKey {
  return parseWith(nodeKeySchema, readJSONMaybeYAML(file), file);
}

export function readGenesis(file: string): GenesisData {
  return parseWith(genesisSchema, readJSONMaybeYAML(file), file);
}

/** The sequencer must schedule exactly the genesis validators, in genesis order. */
export function assertSequencerMatchesGenesis(sequencer: SequencerConfig, genesis: GenesisData): void {
  const scheduled = sequencer.validators.map((v) => v.pubKey);
  const declared = genesis.validators.map((v) => v.pubKey);
  if (scheduled.length !== declared.length || scheduled.some((pubKey, i) => pubKey !== declared[i])) {
    throw new Error(
      `Sequencer validators [${scheduled.join(", ")}] do not match genesis validators [${declared.join(", ")}]`
    );
  }
}

export async function startNodeFromConfig(configPath: string): Promise<ChainNode<LedgerStore>> {
  const { config, genesisPath, keyPath, dataDir } = loadConfigFile(configPath);
  if (config.stateMachine !== "ledger") {
    throw new Error(`Unknown state machine: ${config.stateMachine}`);
  }
  const genesis = readGenesis(genesisPath);
  if (genesis.chainId !== config.chainId) {
    throw new Error(`Genesis chain id ${genesis.chainId} does not match config chain id ${config.chainId}`);
  }
  assertSequencerMatchesGenesis(config.sequencer, genesis);
  const key = readKey(keyPath);
  await fsExtra.ensureDir(dataDir);

  const node: ChainNode<LedgerStore> = new ChainNode<LedgerStore>({
    chainId: config.chainId,
    genesis,
    sequencer: createSequencer(config.sequencer),
    stateMachine: createLedgerStateMachine(),
    key,
    storage: new LevelBlockStore(dataDir),
    blockTimeMs: config.blockTimeMs,
    maxTxsPerBlock: config.maxTxsPerBlock,
    api: config.api,
    apiRouters: [createLedgerRouter(() => node.getState())],
    logger: getLogger("node")
  });

  await node.start();
  return node;
}

export interface InitChainOptions {
  approvalPolicy: ApprovalPolicyName;
  apiPort?: number;
}

/** Writes a validator key, genesis and node config for a new single-validator chain. */
export async function initChain(dir: string, name: string, opts: InitChainOptions): Promise<string> {
  await fsExtra.ensureDir(path.join(dir, "keys"));
  const key = await generateKeyPair();
  await fsExtra.writeJSON(path.join(dir, "keys", "validator.json"), key, { spaces: 2 });
  const chainId = `tillchain-${name}`;
  const genesis: GenesisData = {
    chainId,
    validators: [{ name: "validator", pubKey: key.pubKey }],
    appState: { approvalPolicy: opts.approvalPolicy }
  };
  await fsExtra.writeJSON(path.join(dir, "genesis.json"), genesis, { spaces: 2 });
  const config: NodeConfigFile = {
    chainId,
    stateMachine: "ledger",
    genesis: "./genesis.json",
    key: "./keys/validator.json",
    sequencer: { type: "solo", validators: [{ name: "validator", pubKey: key.pubKey }] },
    api: { port: opts.apiPort ?? DEFAULT_API_PORT },
    storage: "./data"
  };
  const configPath = path.join(dir, "config.json");
  await fsExtra.writeJSON(configPath, config, { spaces: 2 });
  return configPath;
}
