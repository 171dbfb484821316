import { calculateTxId, NodeKey, signMessage, Transaction } from "@tillchain/core";
import { TxKind, TxType } from "./transactions";

type Amount = bigint | number;

/** Builds an envelope with its id computed and no signature yet. */
export function buildTransaction(type: TxKind, payload: Record<string, unknown>, senderPubKey: string): Transaction {
  const base = { type, payload, senderPubKey };
  return { ...base, id: calculateTxId(base), signature: "" };
}

export async function signTransaction(type: TxKind, payload: Record<string, unknown>, key: NodeKey): Promise<Transaction> {
  const tx = buildTransaction(type, payload, key.pubKey);
  return { ...tx, signature: await signMessage(tx.id, key.privKey) };
}

export function createWalletPayload(name: string): Record<string, unknown> {
  return { name };
}

export function issuePayload(amount: Amount, seed: Amount): Record<string, unknown> {
  return { amount: amount.toString(), seed: seed.toString() };
}

export function transferPayload(
  from: string,
  args: { to: string; approver: string; amount: Amount; seed: Amount }
): Record<string, unknown> {
  return {
    from,
    to: args.to,
    approver: args.approver,
    amount: args.amount.toString(),
    seed: args.seed.toString()
  };
}

export function approvePayload(approver: string, args: { transferTxHash: string; seed: Amount }): Record<string, unknown> {
  return { approver, transferTxHash: args.transferTxHash, seed: args.seed.toString() };
}

export function createWallet(key: NodeKey, name: string): Promise<Transaction> {
  return signTransaction(TxType.CreateWallet, createWalletPayload(name), key);
}

export function issue(key: NodeKey, amount: Amount, seed: Amount = 0): Promise<Transaction> {
  return signTransaction(TxType.Issue, issuePayload(amount, seed), key);
}

export function transfer(
  key: NodeKey,
  args: { to: string; approver: string; amount: Amount; seed?: Amount }
): Promise<Transaction> {
  return signTransaction(TxType.Transfer, transferPayload(key.pubKey, { ...args, seed: args.seed ?? 0 }), key);
}

export function approve(key: NodeKey, args: { transferTxHash: string; seed?: Amount }): Promise<Transaction> {
  return signTransaction(TxType.Approve, approvePayload(key.pubKey, { ...args, seed: args.seed ?? 0 }), key);
}
