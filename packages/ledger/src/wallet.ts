import { z } from "zod";
import { hexKeySchema, uint64Schema } from "./uint64";

export interface Wallet {
  readonly pubKey: string;
  /** Set once by CreateWallet. */
  readonly name: string;
  readonly balance: bigint;
  /** Debited from `balance` by pending transfers, not yet credited to their receivers. */
  readonly retainedAmount: bigint;
  readonly historyLen: number;
  readonly historyHash: string;
}

export type TransferStatus = "pending" | "finalized";

export interface PendingTransfer {
  /** Hash of the Transfer transaction that opened it. */
  readonly txHash: string;
  readonly from: string;
  readonly to: string;
  readonly approver: string;
  readonly amount: bigint;
  readonly status: TransferStatus;
  /** Hash of the Approve that finalized it. */
  readonly approvedBy?: string;
}

export type WalletJson = {
  pubKey: string;
  name: string;
  balance: string;
  retainedAmount: string;
  historyLen: number;
  historyHash: string;
};

export type PendingTransferJson = {
  txHash: string;
  from: string;
  to: string;
  approver: string;
  amount: string;
  status: TransferStatus;
  approvedBy: string | null;
};

export const walletJsonSchema = z
  .object({
    pubKey: hexKeySchema,
    name: z.string(),
    balance: uint64Schema,
    retainedAmount: uint64Schema,
    historyLen: z.number().int().nonnegative(),
    historyHash: hexKeySchema
  })
  .strict();

export const pendingTransferJsonSchema = z
  .object({
    txHash: hexKeySchema,
    from: hexKeySchema,
    to: hexKeySchema,
    approver: hexKeySchema,
    amount: uint64Schema,
    status: z.enum(["pending", "finalized"]),
    approvedBy: hexKeySchema.nullable()
  })
  .strict();

export function walletToJson(wallet: Wallet): WalletJson {
  return {
    pubKey: wallet.pubKey,
    name: wallet.name,
    balance: wallet.balance.toString(),
    retainedAmount: wallet.retainedAmount.toString(),
    historyLen: wallet.historyLen,
    historyHash: wallet.historyHash
  };
}

export function pendingTransferToJson(transfer: PendingTransfer): PendingTransferJson {
  return {
    txHash: transfer.txHash,
    from: transfer.from,
    to: transfer.to,
    approver: transfer.approver,
    amount: transfer.amount.toString(),
    status: transfer.status,
    approvedBy: transfer.approvedBy ?? null
  };
}
