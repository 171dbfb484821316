import { EventEmitter } from "events";
import type { Router } from "express";
import { calculateBlockHash, calculateTxId } from "./hash";
import { signMessage, verifyMessage } from "./crypto";
import { getLogger, Logger } from "./logger";
import { Mempool } from "./mempool";
import { ApiServer, startApiServer } from "./server";
import {
  ApiConfig,
  Block,
  BlockDraft,
  BlockStore,
  GenesisData,
  NewBlockEvent,
  NodeConfig,
  NodeKey,
  NodeStatus,
  Sequencer,
  StateMachine,
  StateSnapshot,
  Transaction,
  TxReceipt
} from "./types";

const DEFAULT_BLOCK_TIME = 2000;
const DEFAULT_MAX_TXS_PER_BLOCK = 100;
const MAX_EXPORT_RANGE = 200;

export interface ChainNodeOptions<State> extends NodeConfig<State> {
  api?: ApiConfig;
  apiRouters?: Router[];
  logger?: Logger;
}

export class ChainNode<State = unknown> extends EventEmitter {
  private chainId: string;
  private mempool: Mempool;
  private sequencer: Sequencer;
  private stateMachine: StateMachine<State>;
  private storage: BlockStore;
  private key: NodeKey;
  private genesis: GenesisData;
  private blockTimeMs: number;
  private maxTxsPerBlock: number;
  private apiConfig?: ApiConfig;
  private apiRouters: Router[];
  private apiServer?: ApiServer;
  private logger: Logger;
  private running = false;
  private produceTimer?: NodeJS.Timeout;
  private latestState?: { height: number; state: State };
  // block production and block import run one at a time, in arrival order
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config: ChainNodeOptions<State>) {
    super();
    this.chainId = config.chainId;
    this.sequencer = config.sequencer;
    this.stateMachine = config.stateMachine;
    this.storage = config.storage;
    this.key = config.key;
    this.genesis = config.genesis;
    this.blockTimeMs = config.blockTimeMs ?? DEFAULT_BLOCK_TIME;
    this.maxTxsPerBlock = config.maxTxsPerBlock ?? DEFAULT_MAX_TXS_PER_BLOCK;
    this.apiConfig = config.api;
    this.apiRouters = config.apiRouters ?? [];
    this.logger = config.logger ?? getLogger("node");
    this.mempool = new Mempool();
  }

  async init(): Promise<void> {
    await this.storage.init();
    const latest = await this.storage.getLatestState();
    if (!latest) {
      const initialState = this.stateMachine.initState(this.genesis);
      // derived from genesis alone so every replica builds the same block 0
      const draft: BlockDraft = {
        height: 0,
        timestamp: 0,
        prevHash: null,
        txs: [],
        stateHash: this.stateMachine.stateHash(initialState),
        proposerPubKey: this.genesis.validators.length > 0 ? this.genesis.validators[0].pubKey : ""
      };
      await this.storage.putBlock(
        { ...draft, signature: "", blockHash: calculateBlockHash(draft) },
        this.stateMachine.exportState(initialState),
        []
      );
      this.latestState = { height: 0, state: initialState };
      this.logger.info({ chainId: this.chainId, stateMachine: this.stateMachine.name }, "Initialized genesis state");
    } else {
      this.latestState = { height: latest.height, state: this.stateMachine.restoreState(latest.state) };
      this.logger.info({ chainId: this.chainId, height: latest.height }, "Restored state from storage");
    }
    if (this.apiConfig) {
      this.apiServer = await startApiServer(this, this.apiConfig, this.apiRouters);
    }
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    await this.init();
    this.scheduleProducer();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.produceTimer) {
      clearInterval(this.produceTimer);
    }
    await this.queue;
    if (this.apiServer) {
      await this.apiServer.stop();
    }
    await this.storage.close();
  }

  private scheduleProducer(): void {
    this.produceTimer = setInterval(() => {
      this.tryProduceBlock().catch((err) => {
        this.logger.error({ err }, "Block production failed");
        this.emit("error", err);
      });
    }, this.blockTimeMs);
  }

  private getLatestHeight(): number {
    return this.latestState?.height ?? 0;
  }

  private requireState(): State {
    if (!this.latestState) {
      throw new Error("State not initialized");
    }
    return this.latestState.state;
  }

  private normalize(tx: Transaction): Transaction {
    const id = calculateTxId(tx);
    if (tx.id && tx.id !== id) {
      throw new Error(`Transaction id mismatch: expected ${id}`);
    }
    return { ...tx, id };
  }

  async addTransaction(tx: Transaction): Promise<{ accepted: boolean; id: string }> {
    const normalized = this.normalize(tx);
    await this.stateMachine.checkTx(normalized);
    const added = this.mempool.add(normalized);
    if (added) {
      this.logger.debug({ txId: normalized.id, type: normalized.type }, "Admitted transaction");
      this.emit("tx", normalized);
    }
    return { accepted: added, id: normalized.id };
  }

  getState(): State | undefined {
    return this.latestState?.state;
  }

  exportState(): unknown {
    return this.stateMachine.exportState(this.requireState());
  }

  getHeight(): number {
    return this.getLatestHeight();
  }

  getStatus(): NodeStatus {
    return {
      chainId: this.chainId,
      height: this.getLatestHeight(),
      mempool: this.mempool.size(),
      sequencer: this.sequencer.type,
      validators: this.sequencer.validators().map((v) => v.pubKey)
    };
  }

  getBlock = async (height: number): Promise<Block | undefined> => {
    return this.storage.getBlock(height);
  };

  getLatestBlock = async (): Promise<Block | undefined> => {
    return this.storage.getBlock(this.getLatestHeight());
  };

  async getBlocks(from: number, to: number): Promise<Block[]> {
    const last = Math.min(to, from + MAX_EXPORT_RANGE, this.getLatestHeight());
    const blocks: Block[] = [];
    for (let h = from; h <= last; h++) {
      const block = await this.storage.getBlock(h);
      if (block) blocks.push(block);
    }
    return blocks;
  }

  async getStateAtHeight(height: number): Promise<{ height: number; state: unknown } | undefined> {
    const state = await this.storage.getState(height);
    if (state === undefined) return undefined;
    return { height, state };
  }

  async exportSnapshot(height?: number): Promise<StateSnapshot | undefined> {
    const target = height ?? this.getLatestHeight();
    const [state, block] = await Promise.all([this.storage.getState(target), this.storage.getBlock(target)]);
    if (state === undefined) return undefined;
    return { chainId: this.chainId, height: target, blockHash: block ? block.blockHash : null, state };
  }

  getReceipt(txId: string): Promise<TxReceipt | undefined> {
    return this.storage.getReceipt(txId);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // the caller observes the failure through `run`; the queue itself moves on
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async tryProduceBlock(): Promise<Block | undefined> {
    if (!this.running) return undefined;
    return this.proposeBlock();
  }

  /** Cuts a block from the mempool if this node is the proposer for the next height. */
  proposeBlock(): Promise<Block | undefined> {
    return this.enqueue(async () => {
      const nextHeight = this.getLatestHeight() + 1;
      const proposer = this.sequencer.getProposer(nextHeight);
      if (proposer.pubKey !== this.key.pubKey) {
        return undefined;
      }
      const txs = this.mempool.peek(this.maxTxsPerBlock);
      if (txs.length === 0) return undefined;
      return this.buildBlock(txs);
    });
  }

  /** Executes `txs` in order on top of the latest state and commits the result as the next block. */
  createAndCommitBlock(txs: Transaction[]): Promise<Block> {
    return this.enqueue(() => this.buildBlock(txs));
  }

  private async buildBlock(txs: Transaction[]): Promise<Block> {
    const height = this.getLatestHeight() + 1;
    const prevBlock = await this.storage.getBlock(height - 1);
    const prevHash = prevBlock ? prevBlock.blockHash : null;
    const applied = txs.map((tx) => this.normalize(tx));
    const { state, receipts } = await this.execute(applied, height);
    const draft: BlockDraft = {
      height,
      timestamp: Date.now(),
      prevHash,
      txs: applied,
      stateHash: this.stateMachine.stateHash(state),
      proposerPubKey: this.key.pubKey
    };
    const blockHash = calculateBlockHash(draft);
    const signature = await signMessage(blockHash, this.key.privKey);
    const block: Block = { ...draft, blockHash, signature };
    await this.commitBlock(block, state, receipts);
    return block;
  }

  private async execute(txs: Transaction[], height: number): Promise<{ state: State; receipts: TxReceipt[] }> {
    const current = this.requireState();
    const working = this.stateMachine.cloneState
      ? this.stateMachine.cloneState(current)
      : this.stateMachine.restoreState(this.stateMachine.exportState(current));
    const receipts: TxReceipt[] = [];
    for (const [index, tx] of txs.entries()) {
      const status = await this.stateMachine.executeTx(working, tx);
      if (status.type === "error") {
        this.logger.debug({ txId: tx.id, height, code: status.code, reason: status.name }, "Transaction rejected");
      }
      receipts.push({ txId: tx.id, height, index, status });
    }
    return { state: working, receipts };
  }

  private async commitBlock(block: Block, state: State, receipts: TxReceipt[]): Promise<void> {
    const kept: TxReceipt[] = [];
    const succeeded = new Set<string>();
    for (const receipt of receipts) {
      // a replayed id is rejected later, but the original success stays on record
      if (succeeded.has(receipt.txId)) continue;
      const existing = await this.storage.getReceipt(receipt.txId);
      if (existing?.status.type === "success") continue;
      if (receipt.status.type === "success") succeeded.add(receipt.txId);
      kept.push(receipt);
    }
    await this.storage.putBlock(block, this.stateMachine.exportState(state), kept);
    this.latestState = { height: block.height, state };
    this.mempool.remove(block.txs.map((t) => t.id));
    this.logger.info(
      { height: block.height, txs: block.txs.length, blockHash: block.blockHash, stateHash: block.stateHash },
      "Committed block"
    );
    const event: NewBlockEvent = { block, receipts };
    this.emit("block", event);
  }

  /** Verifies and re-executes a block produced by another node. */
  async importBlock(block: Block): Promise<void> {
    try {
      await this.enqueue(() => this.validateAndApplyBlock(block));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ height: block.height, reason: message }, "Rejected block");
      this.emit("warn", `Rejecting block ${block.height}: ${message}`);
      throw err;
    }
  }

  private async validateAndApplyBlock(block: Block): Promise<void> {
    const expectedHash = calculateBlockHash({
      height: block.height,
      timestamp: block.timestamp,
      prevHash: block.prevHash,
      txs: block.txs,
      stateHash: block.stateHash,
      proposerPubKey: block.proposerPubKey
    });
    if (expectedHash !== block.blockHash) {
      throw new Error("Invalid block hash");
    }
    const signatureValid = await verifyMessage(block.blockHash, block.signature, block.proposerPubKey);
    if (!signatureValid) {
      throw new Error("Invalid proposer signature");
    }
    if (!this.sequencer.isProposer(block.proposerPubKey, block.height)) {
      throw new Error("Unexpected proposer");
    }
    if (block.height !== this.getLatestHeight() + 1) {
      throw new Error(`Out of order block: expected height ${this.getLatestHeight() + 1}`);
    }
    const prevBlock = await this.storage.getBlock(block.height - 1);
    const prevHash = prevBlock ? prevBlock.blockHash : null;
    if (block.prevHash !== prevHash) {
      throw new Error("Prev hash mismatch");
    }
    const txs = block.txs.map((tx) => this.normalize(tx));
    const { state, receipts } = await this.execute(txs, block.height);
    if (this.stateMachine.stateHash(state) !== block.stateHash) {
      throw new Error("State hash mismatch");
    }
    await this.commitBlock(block, state, receipts);
  }
}
