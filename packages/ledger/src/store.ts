import { z } from "zod";
import { hashObject } from "@tillchain/core";
import { LedgerStoreError } from "./errors";
import { EMPTY_HISTORY_HASH, foldHistory } from "./history";
import { APPROVAL_POLICY_NAMES, ApprovalPolicyName, DEFAULT_APPROVAL_POLICY } from "./policy";
import { fitsU64, hexKeySchema } from "./uint64";
import {
  PendingTransfer,
  PendingTransferJson,
  pendingTransferJsonSchema,
  pendingTransferToJson,
  Wallet,
  WalletJson,
  walletJsonSchema,
  walletToJson
} from "./wallet";

export type LedgerMutation =
  | { type: "putWallet"; wallet: Wallet }
  | { type: "putPending"; transfer: PendingTransfer }
  | { type: "appendHistory"; walletKey: string; txHash: string }
  | { type: "markApplied"; txHash: string }
  | { type: "recordIssue"; amount: bigint };

/** Read access shared by the store and its forks. */
export interface LedgerView {
  getWallet(key: string): Wallet | undefined;
  getPending(txHash: string): PendingTransfer | undefined;
  getHistory(key: string): readonly string[];
  isApplied(txHash: string): boolean;
  totalIssued(): bigint;
}

export interface LedgerTotals {
  issued: bigint;
  balances: bigint;
  retained: bigint;
}

export type LedgerSnapshot = {
  version: 1;
  approvalPolicy: ApprovalPolicyName;
  issued: string;
  wallets: WalletJson[];
  pending: PendingTransferJson[];
  history: { [walletKey: string]: string[] };
  applied: string[];
};

const ledgerSnapshotSchema = z
  .object({
    version: z.literal(1),
    approvalPolicy: z.enum(APPROVAL_POLICY_NAMES),
    issued: z
      .string()
      .regex(/^(0|[1-9][0-9]*)$/)
      .transform((value) => BigInt(value)),
    wallets: z.array(walletJsonSchema),
    pending: z.array(pendingTransferJsonSchema),
    history: z.record(hexKeySchema, z.array(hexKeySchema)),
    applied: z.array(hexKeySchema)
  })
  .strict();

function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function checkWallet(wallet: Wallet): void {
  if (!fitsU64(wallet.balance)) {
    throw new LedgerStoreError(`Wallet ${wallet.pubKey} balance out of range: ${wallet.balance}`);
  }
  if (!fitsU64(wallet.retainedAmount)) {
    throw new LedgerStoreError(`Wallet ${wallet.pubKey} retained amount out of range: ${wallet.retainedAmount}`);
  }
}

/**
 * Resident ledger state. Every write goes through `apply`, which either
 * commits a whole batch or throws before writing anything.
 */
export class LedgerStore implements LedgerView {
  private wallets = new Map<string, Wallet>();
  private pending = new Map<string, PendingTransfer>();
  private history = new Map<string, string[]>();
  private applied = new Set<string>();
  private issued = 0n;

  constructor(readonly approvalPolicy: ApprovalPolicyName = DEFAULT_APPROVAL_POLICY) {}

  getWallet(key: string): Wallet | undefined {
    return this.wallets.get(key);
  }

  getPending(txHash: string): PendingTransfer | undefined {
    return this.pending.get(txHash);
  }

  getHistory(key: string): readonly string[] {
    return this.history.get(key) ?? [];
  }

  isApplied(txHash: string): boolean {
    return this.applied.has(txHash);
  }

  totalIssued(): bigint {
    return this.issued;
  }

  putWallet(key: string, wallet: Wallet): void {
    if (key !== wallet.pubKey) {
      throw new LedgerStoreError(`Wallet key mismatch: ${key} != ${wallet.pubKey}`);
    }
    this.apply([{ type: "putWallet", wallet }]);
  }

  putPending(txHash: string, transfer: PendingTransfer): void {
    if (txHash !== transfer.txHash) {
      throw new LedgerStoreError(`Transfer hash mismatch: ${txHash} != ${transfer.txHash}`);
    }
    this.apply([{ type: "putPending", transfer }]);
  }

  fork(): LedgerFork {
    return new LedgerFork(this);
  }

  apply(mutations: readonly LedgerMutation[]): void {
    const wallets = new Map<string, Wallet>();
    const pending = new Map<string, PendingTransfer>();
    const appended = new Map<string, string[]>();
    const applied = new Set<string>();
    let issued = this.issued;

    for (const mutation of mutations) {
      switch (mutation.type) {
        case "putWallet":
          checkWallet(mutation.wallet);
          wallets.set(mutation.wallet.pubKey, mutation.wallet);
          break;
        case "putPending":
          if (mutation.transfer.amount <= 0n) {
            throw new LedgerStoreError(`Transfer ${mutation.transfer.txHash} has a non-positive amount`);
          }
          pending.set(mutation.transfer.txHash, mutation.transfer);
          break;
        case "appendHistory": {
          const entries = appended.get(mutation.walletKey) ?? [];
          entries.push(mutation.txHash);
          appended.set(mutation.walletKey, entries);
          break;
        }
        case "markApplied":
          if (this.applied.has(mutation.txHash) || applied.has(mutation.txHash)) {
            throw new LedgerStoreError(`Transaction ${mutation.txHash} is already marked applied`);
          }
          applied.add(mutation.txHash);
          break;
        case "recordIssue":
          if (mutation.amount <= 0n) {
            throw new LedgerStoreError("Issued amount must be positive");
          }
          issued += mutation.amount;
          break;
      }
    }

    for (const key of appended.keys()) {
      if (!wallets.has(key)) {
        throw new LedgerStoreError(`History appended for ${key} without a wallet update`);
      }
    }
    for (const [key, wallet] of wallets) {
      const previous = this.wallets.get(key);
      const extra = appended.get(key) ?? [];
      const expectedLen = this.getHistory(key).length + extra.length;
      if (wallet.historyLen !== expectedLen) {
        throw new LedgerStoreError(`Wallet ${key} history length ${wallet.historyLen} != ${expectedLen}`);
      }
      const expectedHash = foldHistory(extra, previous ? previous.historyHash : EMPTY_HISTORY_HASH);
      if (wallet.historyHash !== expectedHash) {
        throw new LedgerStoreError(`Wallet ${key} history hash does not extend its chain`);
      }
      if (previous && previous.name !== wallet.name) {
        throw new LedgerStoreError(`Wallet ${key} name cannot change`);
      }
    }

    for (const [key, wallet] of wallets) {
      this.wallets.set(key, wallet);
    }
    for (const [txHash, transfer] of pending) {
      this.pending.set(txHash, transfer);
    }
    for (const [key, entries] of appended) {
      this.history.set(key, [...this.getHistory(key), ...entries]);
    }
    for (const txHash of applied) {
      this.applied.add(txHash);
    }
    this.issued = issued;
  }

  /** Copy that shares no mutable structure with this store. Records are immutable, so only the maps are copied. */
  clone(): LedgerStore {
    const copy = new LedgerStore(this.approvalPolicy);
    copy.wallets = new Map(this.wallets);
    copy.pending = new Map(this.pending);
    copy.history = new Map(this.history);
    copy.applied = new Set(this.applied);
    copy.issued = this.issued;
    return copy;
  }

  /** Wallets in ascending key order. */
  listWallets(): Wallet[] {
    return [...this.wallets.keys()].sort(byKey).map((key) => this.wallets.get(key)).filter(isDefined);
  }

  listPending(): PendingTransfer[] {
    return [...this.pending.keys()].sort(byKey).map((key) => this.pending.get(key)).filter(isDefined);
  }

  totals(): LedgerTotals {
    let balances = 0n;
    let retained = 0n;
    for (const wallet of this.wallets.values()) {
      balances += wallet.balance;
      retained += wallet.retainedAmount;
    }
    return { issued: this.issued, balances, retained };
  }

  toSnapshot(): LedgerSnapshot {
    const history: { [walletKey: string]: string[] } = {};
    for (const key of [...this.history.keys()].sort(byKey)) {
      history[key] = [...this.getHistory(key)];
    }
    return {
      version: 1,
      approvalPolicy: this.approvalPolicy,
      issued: this.issued.toString(),
      wallets: this.listWallets().map(walletToJson),
      pending: this.listPending().map(pendingTransferToJson),
      history,
      applied: [...this.applied].sort(byKey)
    };
  }

  stateHash(): string {
    return hashObject(this.toSnapshot());
  }

  static fromSnapshot(raw: unknown): LedgerStore {
    const parsed = ledgerSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new LedgerStoreError(`Invalid ledger snapshot: ${detail}`);
    }
    const snapshot = parsed.data;
    const store = new LedgerStore(snapshot.approvalPolicy);
    const walletKeys = new Set(snapshot.wallets.map((wallet) => wallet.pubKey));
    for (const key of Object.keys(snapshot.history)) {
      if (!walletKeys.has(key)) {
        throw new LedgerStoreError(`Snapshot has history for unknown wallet ${key}`);
      }
    }
    for (const wallet of snapshot.wallets) {
      const entries = snapshot.history[wallet.pubKey] ?? [];
      if (entries.length !== wallet.historyLen || foldHistory(entries) !== wallet.historyHash) {
        throw new LedgerStoreError(`Snapshot history for ${wallet.pubKey} does not match its head`);
      }
      store.wallets.set(wallet.pubKey, wallet);
      store.history.set(wallet.pubKey, [...entries]);
    }
    for (const transfer of snapshot.pending) {
      const { approvedBy, ...rest } = transfer;
      store.pending.set(transfer.txHash, approvedBy === null ? rest : { ...rest, approvedBy });
    }
    for (const txHash of snapshot.applied) {
      store.applied.add(txHash);
    }
    store.issued = snapshot.issued;
    return store;
  }
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/**
 * Copy-on-write overlay over a view. Writes are buffered as mutations and
 * reach the store only through `LedgerStore.apply(fork.mutations())`.
 */
export class LedgerFork implements LedgerView {
  private wallets = new Map<string, Wallet>();
  private pending = new Map<string, PendingTransfer>();
  private history = new Map<string, string[]>();
  private applied = new Set<string>();
  private issued = 0n;
  private log: LedgerMutation[] = [];

  constructor(private readonly base: LedgerView) {}

  getWallet(key: string): Wallet | undefined {
    return this.wallets.get(key) ?? this.base.getWallet(key);
  }

  getPending(txHash: string): PendingTransfer | undefined {
    return this.pending.get(txHash) ?? this.base.getPending(txHash);
  }

  getHistory(key: string): readonly string[] {
    const extra = this.history.get(key);
    return extra ? [...this.base.getHistory(key), ...extra] : this.base.getHistory(key);
  }

  isApplied(txHash: string): boolean {
    return this.applied.has(txHash) || this.base.isApplied(txHash);
  }

  totalIssued(): bigint {
    return this.base.totalIssued() + this.issued;
  }

  putWallet(wallet: Wallet): void {
    this.wallets.set(wallet.pubKey, wallet);
    this.log.push({ type: "putWallet", wallet });
  }

  putPending(transfer: PendingTransfer): void {
    this.pending.set(transfer.txHash, transfer);
    this.log.push({ type: "putPending", transfer });
  }

  appendHistory(walletKey: string, txHash: string): void {
    const entries = this.history.get(walletKey) ?? [];
    entries.push(txHash);
    this.history.set(walletKey, entries);
    this.log.push({ type: "appendHistory", walletKey, txHash });
  }

  markApplied(txHash: string): void {
    this.applied.add(txHash);
    this.log.push({ type: "markApplied", txHash });
  }

  recordIssue(amount: bigint): void {
    this.issued += amount;
    this.log.push({ type: "recordIssue", amount });
  }

  mutations(): readonly LedgerMutation[] {
    return [...this.log];
  }
}
