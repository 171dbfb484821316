import { LedgerError } from "./errors";
import type { LedgerFork, LedgerView } from "./store";

/** Tracks the hashes of committed transactions so none is applied twice. */
export class DedupGuard {
  check(view: LedgerView, txHash: string): void {
    if (view.isApplied(txHash)) {
      throw new LedgerError("DuplicateTransaction");
    }
  }

  record(fork: LedgerFork, txHash: string): void {
    fork.markApplied(txHash);
  }
}
