import { Block, BlockStore, JsonValue, TxReceipt } from "./types";

/**
 * Non-durable BlockStore. Blocks and snapshots are kept as JSON text so that
 * callers never share references with what was stored.
 */
export class MemoryBlockStore implements BlockStore {
  private height = 0;
  private blocks = new Map<number, string>();
  private states = new Map<number, string>();
  private receipts = new Map<string, TxReceipt>();

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async getLatestHeight(): Promise<number> {
    return this.height;
  }

  async getBlock(height: number): Promise<Block | undefined> {
    const raw = this.blocks.get(height);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async putBlock(block: Block, stateSnapshot: JsonValue, receipts: TxReceipt[]): Promise<void> {
    this.blocks.set(block.height, JSON.stringify(block));
    this.states.set(block.height, JSON.stringify(stateSnapshot));
    for (const receipt of receipts) {
      this.receipts.set(receipt.txId, receipt);
    }
    this.height = block.height;
  }

  async getState(height: number): Promise<JsonValue | undefined> {
    const raw = this.states.get(height);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async getLatestState(): Promise<{ height: number; state: JsonValue } | undefined> {
    const state = await this.getState(this.height);
    if (state === undefined) return undefined;
    return { height: this.height, state };
  }

  async getReceipt(txId: string): Promise<TxReceipt | undefined> {
    return this.receipts.get(txId);
  }
}
