import { EventEmitter } from "events";
import { Transaction } from "./types";

/** Insertion-ordered pool of admitted transactions, keyed by id. */
export class Mempool extends EventEmitter {
  private txs: Map<string, Transaction> = new Map();

  add(tx: Transaction): boolean {
    if (this.txs.has(tx.id)) {
      return false;
    }
    this.txs.set(tx.id, tx);
    this.emit("tx", tx);
    return true;
  }

  has(id: string): boolean {
    return this.txs.has(id);
  }

  size(): number {
    return this.txs.size;
  }

  all(): Transaction[] {
    return Array.from(this.txs.values());
  }

  peek(max: number): Transaction[] {
    return Array.from(this.txs.values()).slice(0, max);
  }

  remove(ids: string[]): void {
    for (const id of ids) {
      this.txs.delete(id);
    }
  }

  clear(): void {
    this.txs.clear();
  }
}
