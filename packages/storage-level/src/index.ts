import { Level } from "level";
import type { AbstractLevel } from "abstract-level";
import { Block, BlockStore, JsonValue, TxReceipt } from "@tillchain/core";

export type StringLevel = AbstractLevel<string | Buffer | Uint8Array, string, string>;

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "LEVEL_NOT_FOUND";
}

/**
 * BlockStore over any abstract-level database with string keys and values.
 * Each block, its state snapshot, its receipts and the height pointer are
 * written in one batch.
 */
export class LevelBlockStore implements BlockStore {
  private db: StringLevel;
  private initialized = false;

  constructor(pathOrDb: string | StringLevel) {
    this.db = typeof pathOrDb === "string" ? new Level<string, string>(pathOrDb, { valueEncoding: "utf8" }) : pathOrDb;
  }

  private async read(key: string): Promise<string | undefined> {
    try {
      return await this.db.get(key);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    await this.db.open();
    if ((await this.read("height")) === undefined) {
      await this.db.put("height", "0");
    }
    this.initialized = true;
  }

  async close(): Promise<void> {
    await this.db.close();
    this.initialized = false;
  }

  async getLatestHeight(): Promise<number> {
    const h = await this.read("height");
    return h === undefined ? 0 : Number(h);
  }

  async getBlock(height: number): Promise<Block | undefined> {
    const raw = await this.read(`block:${height}`);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async putBlock(block: Block, stateSnapshot: JsonValue, receipts: TxReceipt[]): Promise<void> {
    const batch = this.db.batch();
    batch.put(`block:${block.height}`, JSON.stringify(block));
    batch.put(`state:${block.height}`, JSON.stringify(stateSnapshot));
    for (const receipt of receipts) {
      batch.put(`receipt:${receipt.txId}`, JSON.stringify(receipt));
    }
    batch.put("height", block.height.toString());
    await batch.write();
  }

  async getState(height: number): Promise<JsonValue | undefined> {
    const raw = await this.read(`state:${height}`);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async getLatestState(): Promise<{ height: number; state: JsonValue } | undefined> {
    const height = await this.getLatestHeight();
    const state = await this.getState(height);
    if (state === undefined) return undefined;
    return { height, state };
  }

  async getReceipt(txId: string): Promise<TxReceipt | undefined> {
    const raw = await this.read(`receipt:${txId}`);
    return raw === undefined ? undefined : JSON.parse(raw);
  }
}
