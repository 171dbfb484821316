import { hashHex, ZERO_HASH } from "@tillchain/core";
import { LedgerStoreError } from "./errors";
import type { LedgerFork, LedgerView } from "./store";
import { Wallet } from "./wallet";

export const EMPTY_HISTORY_HASH = ZERO_HASH;

/** One step of a wallet's history chain: SHA-256(prev ‖ txHash). */
export function chainHash(prev: string, txHash: string): string {
  return hashHex(prev, txHash);
}

export function foldHistory(entries: readonly string[], from: string = EMPTY_HISTORY_HASH): string {
  return entries.reduce((acc, entry) => chainHash(acc, entry), from);
}

export interface HistoryHead {
  historyHash: string;
  historyLen: number;
}

/**
 * Proof that a transaction hash sits at `index` in a wallet's history:
 * the chain value before it and every entry after it.
 */
export interface InclusionProof {
  index: number;
  prefixHash: string;
  suffix: string[];
}

export function verifyInclusion(head: Pick<Wallet, "historyHash" | "historyLen">, txHash: string, proof: InclusionProof): boolean {
  if (!Number.isInteger(proof.index) || proof.index < 0) return false;
  if (proof.index + 1 + proof.suffix.length !== head.historyLen) return false;
  return foldHistory(proof.suffix, chainHash(proof.prefixHash, txHash)) === head.historyHash;
}

export class HistoryAccumulator {
  /** Appends `txHash` to the wallet's log inside `fork` and returns the new head. */
  append(fork: LedgerFork, walletKey: string, txHash: string): HistoryHead {
    const wallet = fork.getWallet(walletKey);
    if (!wallet) {
      throw new LedgerStoreError(`Cannot append history for missing wallet ${walletKey}`);
    }
    const head: HistoryHead = {
      historyHash: chainHash(wallet.historyHash, txHash),
      historyLen: wallet.historyLen + 1
    };
    fork.putWallet({ ...wallet, ...head });
    fork.appendHistory(walletKey, txHash);
    return head;
  }

  proveInclusion(view: LedgerView, walletKey: string, txHash: string): InclusionProof | undefined {
    const entries = view.getHistory(walletKey);
    const index = entries.indexOf(txHash);
    if (index < 0) return undefined;
    return {
      index,
      prefixHash: foldHistory(entries.slice(0, index)),
      suffix: entries.slice(index + 1)
    };
  }

  verifyInclusion(view: LedgerView, walletKey: string, txHash: string, proof: InclusionProof): boolean {
    const wallet = view.getWallet(walletKey);
    return wallet !== undefined && verifyInclusion(wallet, txHash, proof);
  }
}
