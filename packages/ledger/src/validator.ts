import { LedgerError } from "./errors";
import { ApprovalPolicy, registeredApprover } from "./policy";
import type { LedgerView } from "./store";
import { Approve, assertNever, CreateWallet, Issue, LedgerTransaction, Transfer } from "./transactions";
import { addU64 } from "./uint64";

/**
 * Semantic checks for each transaction kind against a consistent view.
 * Never writes; the first failing check decides the rejection.
 */
export class TransactionValidator {
  constructor(private readonly approvalPolicy: ApprovalPolicy = registeredApprover) {}

  validate(tx: LedgerTransaction, view: LedgerView): void {
    switch (tx.kind) {
      case "create-wallet":
        return this.validateCreateWallet(tx.signer, tx.payload, view);
      case "issue":
        return this.validateIssue(tx.signer, tx.payload, view);
      case "transfer":
        return this.validateTransfer(tx.signer, tx.payload, view);
      case "approve":
        return this.validateApprove(tx.signer, tx.payload, view);
      default:
        return assertNever(tx);
    }
  }

  /** Same checks as `validate`, reported as a value instead of thrown. */
  check(tx: LedgerTransaction, view: LedgerView): LedgerError | undefined {
    try {
      this.validate(tx, view);
      return undefined;
    } catch (err) {
      if (err instanceof LedgerError) return err;
      throw err;
    }
  }

  private validateCreateWallet(signer: string, payload: CreateWallet, view: LedgerView): void {
    if (view.getWallet(signer)) {
      throw new LedgerError("WalletAlreadyExists");
    }
    if (payload.name.length === 0) {
      throw new LedgerError("InvalidName");
    }
  }

  private validateIssue(signer: string, payload: Issue, view: LedgerView): void {
    if (payload.amount === 0n) {
      throw new LedgerError("InvalidAmount", "Issued amount must be positive");
    }
    const wallet = view.getWallet(signer);
    if (!wallet) {
      throw new LedgerError("WalletNotFound", "Receiver doesn't exist");
    }
    if (addU64(wallet.balance, payload.amount) === undefined) {
      throw new LedgerError("InvalidAmount", "Balance would overflow");
    }
  }

  private validateTransfer(signer: string, payload: Transfer, view: LedgerView): void {
    if (payload.from !== signer) {
      throw new LedgerError("SenderMismatch");
    }
    if (payload.amount === 0n) {
      throw new LedgerError("InvalidAmount", "Transferred amount must be positive");
    }
    if (payload.from === payload.to) {
      throw new LedgerError("SenderIsReceiver");
    }
    const sender = view.getWallet(payload.from);
    if (!sender) {
      throw new LedgerError("WalletNotFound", "Sender doesn't exist");
    }
    if (!view.getWallet(payload.to)) {
      throw new LedgerError("WalletNotFound", "Receiver doesn't exist");
    }
    if (sender.balance < payload.amount) {
      throw new LedgerError("InsufficientFunds");
    }
    if (addU64(sender.retainedAmount, payload.amount) === undefined) {
      throw new LedgerError("InvalidAmount", "Retained amount would overflow");
    }
    const request = { from: payload.from, to: payload.to, approver: payload.approver, amount: payload.amount };
    if (!this.approvalPolicy(request, view)) {
      throw new LedgerError("UnauthorizedApprover", "Approver is not allowed by the approval policy");
    }
  }

  private validateApprove(signer: string, payload: Approve, view: LedgerView): void {
    const transfer = view.getPending(payload.transferTxHash);
    if (!transfer) {
      throw new LedgerError("TransferNotFound");
    }
    if (transfer.status === "finalized") {
      throw new LedgerError("TransferAlreadyFinalized");
    }
    if (signer !== payload.approver || payload.approver !== transfer.approver) {
      throw new LedgerError("UnauthorizedApprover");
    }
    const sender = view.getWallet(transfer.from);
    if (!sender) {
      throw new LedgerError("WalletNotFound", "Sender doesn't exist");
    }
    const receiver = view.getWallet(transfer.to);
    if (!receiver) {
      throw new LedgerError("WalletNotFound", "Receiver doesn't exist");
    }
    if (sender.retainedAmount < transfer.amount) {
      throw new LedgerError("InsufficientFunds", "Retained amount is below the transfer amount");
    }
    if (addU64(receiver.balance, transfer.amount) === undefined) {
      throw new LedgerError("InvalidAmount", "Balance would overflow");
    }
  }
}
