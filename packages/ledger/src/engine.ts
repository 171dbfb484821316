import { ExecutionStatus } from "@tillchain/core";
import { DedupGuard } from "./dedup";
import { LedgerError, LedgerStoreError } from "./errors";
import { EMPTY_HISTORY_HASH, HistoryAccumulator } from "./history";
import { ApprovalPolicy, ApprovalPolicyName, resolveApprovalPolicy } from "./policy";
import { LedgerFork, LedgerStore } from "./store";
import { Approve, assertNever, CreateWallet, Issue, LedgerTransaction, Transfer } from "./transactions";
import { TransactionValidator } from "./validator";
import { Wallet } from "./wallet";

export interface ExecutionEngineOptions {
  /** Overrides the policy named in the store. */
  approvalPolicy?: ApprovalPolicy;
}

function requireWallet(fork: LedgerFork, key: string): Wallet {
  const wallet = fork.getWallet(key);
  if (!wallet) {
    throw new LedgerStoreError(`Wallet ${key} vanished during execution`);
  }
  return wallet;
}

/**
 * The ledger's state-transition function. Each transaction is validated,
 * checked for replay, planned on a fork and committed with a single
 * `LedgerStore.apply`, so it lands completely or not at all.
 */
export class ExecutionEngine {
  private readonly dedup = new DedupGuard();
  private readonly history = new HistoryAccumulator();
  private readonly validators = new Map<ApprovalPolicyName, TransactionValidator>();
  private readonly override?: TransactionValidator;

  constructor(options: ExecutionEngineOptions = {}) {
    if (options.approvalPolicy) {
      this.override = new TransactionValidator(options.approvalPolicy);
    }
  }

  private validatorFor(store: LedgerStore): TransactionValidator {
    if (this.override) return this.override;
    let validator = this.validators.get(store.approvalPolicy);
    if (!validator) {
      validator = new TransactionValidator(resolveApprovalPolicy(store.approvalPolicy));
      this.validators.set(store.approvalPolicy, validator);
    }
    return validator;
  }

  execute(store: LedgerStore, tx: LedgerTransaction): ExecutionStatus {
    try {
      this.validatorFor(store).validate(tx, store);
      this.dedup.check(store, tx.hash);
    } catch (err) {
      if (err instanceof LedgerError) return err.toStatus();
      throw err;
    }
    const fork = store.fork();
    this.transition(fork, tx);
    this.dedup.record(fork, tx.hash);
    store.apply(fork.mutations());
    return { type: "success" };
  }

  private transition(fork: LedgerFork, tx: LedgerTransaction): void {
    switch (tx.kind) {
      case "create-wallet":
        return this.createWallet(fork, tx.hash, tx.signer, tx.payload);
      case "issue":
        return this.issue(fork, tx.hash, tx.signer, tx.payload);
      case "transfer":
        return this.transfer(fork, tx.hash, tx.payload);
      case "approve":
        return this.approve(fork, tx.hash, tx.payload);
      default:
        return assertNever(tx);
    }
  }

  private createWallet(fork: LedgerFork, hash: string, signer: string, payload: CreateWallet): void {
    fork.putWallet({
      pubKey: signer,
      name: payload.name,
      balance: 0n,
      retainedAmount: 0n,
      historyLen: 0,
      historyHash: EMPTY_HISTORY_HASH
    });
    this.history.append(fork, signer, hash);
  }

  private issue(fork: LedgerFork, hash: string, signer: string, payload: Issue): void {
    const wallet = requireWallet(fork, signer);
    fork.putWallet({ ...wallet, balance: wallet.balance + payload.amount });
    fork.recordIssue(payload.amount);
    this.history.append(fork, signer, hash);
  }

  private transfer(fork: LedgerFork, hash: string, payload: Transfer): void {
    const sender = requireWallet(fork, payload.from);
    fork.putWallet({
      ...sender,
      balance: sender.balance - payload.amount,
      retainedAmount: sender.retainedAmount + payload.amount
    });
    fork.putPending({
      txHash: hash,
      from: payload.from,
      to: payload.to,
      approver: payload.approver,
      amount: payload.amount,
      status: "pending"
    });
    // the receiver sees nothing until the transfer is approved
    this.history.append(fork, payload.from, hash);
  }

  private approve(fork: LedgerFork, hash: string, payload: Approve): void {
    const transfer = fork.getPending(payload.transferTxHash);
    if (!transfer) {
      throw new LedgerStoreError(`Transfer ${payload.transferTxHash} vanished during execution`);
    }
    const sender = requireWallet(fork, transfer.from);
    fork.putWallet({ ...sender, retainedAmount: sender.retainedAmount - transfer.amount });
    const receiver = requireWallet(fork, transfer.to);
    fork.putWallet({ ...receiver, balance: receiver.balance + transfer.amount });
    fork.putPending({ ...transfer, status: "finalized", approvedBy: hash });
    this.history.append(fork, transfer.from, hash);
    this.history.append(fork, transfer.to, hash);
  }
}
