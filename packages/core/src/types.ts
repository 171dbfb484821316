export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface Transaction {
  id: string;
  type: string;
  payload: Record<string, unknown>;
  senderPubKey: string;
  signature: string;
}

export type UnsignedTransaction = Omit<Transaction, "id" | "signature">;

export interface Block {
  height: number;
  timestamp: number;
  prevHash: string | null;
  txs: Transaction[];
  stateHash: string;
  proposerPubKey: string;
  signature: string;
  blockHash: string;
}

export type BlockDraft = Omit<Block, "blockHash" | "signature">;

export interface Validator {
  name: string;
  pubKey: string;
}

export interface GenesisData {
  chainId: string;
  validators: Validator[];
  appState?: Record<string, unknown>;
}

export type ExecutionStatus =
  | { type: "success" }
  | { type: "error"; code: number; name: string; description: string };

export interface TxReceipt {
  txId: string;
  height: number;
  index: number;
  status: ExecutionStatus;
}

/**
 * Deterministic application logic driven by the node.
 *
 * `executeTx` may mutate the state it is given, but only when it reports
 * success; a rejected transaction leaves the state exactly as it found it.
 * The node never hands the live state to `executeTx`, only a restored copy.
 */
export interface StateMachine<State = unknown> {
  name: string;
  initState(genesis: GenesisData): State;
  restoreState(snapshot: JsonValue): State;
  exportState(state: State): JsonValue;
  /** Independent copy of `state`; without it the node copies through `exportState`/`restoreState`. */
  cloneState?(state: State): State;
  stateHash(state: State): string;
  /** Admission checks that need no state. Throws to refuse the transaction. */
  checkTx(tx: Transaction): Promise<void> | void;
  executeTx(state: State, tx: Transaction): Promise<ExecutionStatus> | ExecutionStatus;
}

export interface BlockStore {
  init(): Promise<void>;
  close(): Promise<void>;
  getLatestHeight(): Promise<number>;
  getBlock(height: number): Promise<Block | undefined>;
  putBlock(block: Block, stateSnapshot: JsonValue, receipts: TxReceipt[]): Promise<void>;
  getState(height: number): Promise<JsonValue | undefined>;
  getLatestState(): Promise<{ height: number; state: JsonValue } | undefined>;
  getReceipt(txId: string): Promise<TxReceipt | undefined>;
}

/** Supplies the total order: who may propose the block at a given height. */
export interface Sequencer {
  type: string;
  getProposer(height: number): Validator;
  isProposer(pubKey: string, height: number): boolean;
  validators(): Validator[];
}

export interface SignatureVerifier {
  verify(tx: Transaction): Promise<boolean>;
}

export interface NodeKey {
  pubKey: string;
  privKey: string;
}

export interface ApiConfig {
  port: number;
  host?: string;
}

export interface NodeConfig<State = unknown> {
  chainId: string;
  genesis: GenesisData;
  sequencer: Sequencer;
  stateMachine: StateMachine<State>;
  key: NodeKey;
  storage: BlockStore;
  blockTimeMs?: number;
  maxTxsPerBlock?: number;
}

export interface NodeStatus {
  chainId: string;
  height: number;
  mempool: number;
  sequencer: string;
  validators: string[];
}

export interface NewBlockEvent {
  block: Block;
  receipts: TxReceipt[];
}

export interface StateSnapshot {
  chainId: string;
  height: number;
  blockHash: string | null;
  state: JsonValue;
}
