import {
  approvePayload,
  buildTransaction,
  createWalletPayload,
  issuePayload,
  transferPayload
} from "../builders";
import { decodeTransaction, LedgerTransaction, TxType } from "../transactions";

export const ALICE = "a1".repeat(32);
export const BOB = "b2".repeat(32);
export const CAROL = "c3".repeat(32);
export const DAVE = "d4".repeat(32);

type Amount = bigint | number;

export function createWalletTx(signer: string, name: string): LedgerTransaction {
  return decodeTransaction(buildTransaction(TxType.CreateWallet, createWalletPayload(name), signer));
}

export function issueTx(signer: string, amount: Amount, seed: Amount = 0): LedgerTransaction {
  return decodeTransaction(buildTransaction(TxType.Issue, issuePayload(amount, seed), signer));
}

export function transferTx(
  signer: string,
  args: { from?: string; to: string; approver: string; amount: Amount; seed?: Amount }
): LedgerTransaction {
  const payload = transferPayload(args.from ?? signer, { ...args, seed: args.seed ?? 0 });
  return decodeTransaction(buildTransaction(TxType.Transfer, payload, signer));
}

export function approveTx(
  signer: string,
  args: { transferTxHash: string; approver?: string; seed?: Amount }
): LedgerTransaction {
  const payload = approvePayload(args.approver ?? signer, { transferTxHash: args.transferTxHash, seed: args.seed ?? 0 });
  return decodeTransaction(buildTransaction(TxType.Approve, payload, signer));
}
