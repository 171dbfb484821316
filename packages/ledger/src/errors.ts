import { ExecutionStatus } from "@tillchain/core";

/** Stable numeric codes reported in execution statuses. */
export const LedgerErrorCode = {
  WalletAlreadyExists: 0,
  WalletNotFound: 1,
  InvalidAmount: 2,
  InsufficientFunds: 3,
  TransferNotFound: 4,
  TransferAlreadyFinalized: 5,
  UnauthorizedApprover: 6,
  DuplicateTransaction: 7,
  InvalidSignature: 8,
  InvalidName: 9,
  SenderIsReceiver: 10,
  SenderMismatch: 11,
  MalformedTransaction: 12
} as const;

export type LedgerErrorKind = keyof typeof LedgerErrorCode;

const DEFAULT_DESCRIPTIONS: Record<LedgerErrorKind, string> = {
  WalletAlreadyExists: "Wallet already exists",
  WalletNotFound: "Wallet doesn't exist",
  InvalidAmount: "Amount is zero or out of range",
  InsufficientFunds: "Insufficient currency amount",
  TransferNotFound: "Transfer doesn't exist",
  TransferAlreadyFinalized: "Transfer is already finalized",
  UnauthorizedApprover: "Approver is not authorized for this transfer",
  DuplicateTransaction: "Transaction was already applied",
  InvalidSignature: "Invalid signature",
  InvalidName: "Wallet name must not be empty",
  SenderIsReceiver: "Sender and receiver are the same wallet",
  SenderMismatch: "Transfer sender does not match the signer",
  MalformedTransaction: "Malformed transaction"
};

/** A transaction rejection. Raised before any state is touched. */
export class LedgerError extends Error {
  readonly code: number;

  constructor(
    readonly kind: LedgerErrorKind,
    description: string = DEFAULT_DESCRIPTIONS[kind]
  ) {
    super(description);
    this.name = "LedgerError";
    this.code = LedgerErrorCode[kind];
  }

  toStatus(): ExecutionStatus {
    return { type: "error", code: this.code, name: this.kind, description: this.message };
  }
}

/** A batch would break a store invariant; nothing from it was written. */
export class LedgerStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LedgerStoreError";
  }
}
