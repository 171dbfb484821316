import { z } from "zod";
import { calculateTxId, Transaction } from "@tillchain/core";
import { LedgerError } from "./errors";
import { hexKeySchema, uint64Schema } from "./uint64";

export const TxType = {
  CreateWallet: "create-wallet",
  Issue: "issue",
  Transfer: "transfer",
  Approve: "approve"
} as const;

export type TxKind = (typeof TxType)[keyof typeof TxType];

const createWalletSchema = z.object({ name: z.string() }).strict();

const issueSchema = z.object({ amount: uint64Schema, seed: uint64Schema }).strict();

const transferSchema = z
  .object({
    from: hexKeySchema,
    to: hexKeySchema,
    approver: hexKeySchema,
    amount: uint64Schema,
    seed: uint64Schema
  })
  .strict();

const approveSchema = z
  .object({
    approver: hexKeySchema,
    transferTxHash: hexKeySchema,
    seed: uint64Schema
  })
  .strict();

export type CreateWallet = z.infer<typeof createWalletSchema>;
export type Issue = z.infer<typeof issueSchema>;
export type Transfer = z.infer<typeof transferSchema>;
export type Approve = z.infer<typeof approveSchema>;

interface Envelope {
  /** Content hash of the envelope; the transaction's identity. */
  hash: string;
  signer: string;
}

export type LedgerTransaction =
  | (Envelope & { kind: "create-wallet"; payload: CreateWallet })
  | (Envelope & { kind: "issue"; payload: Issue })
  | (Envelope & { kind: "transfer"; payload: Transfer })
  | (Envelope & { kind: "approve"; payload: Approve });

function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown, kind: TxKind): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`).join("; ");
    throw new LedgerError("MalformedTransaction", `Malformed ${kind} payload: ${detail}`);
  }
  return result.data;
}

/**
 * Decodes a transaction envelope into one of the four ledger kinds.
 * The hash is recomputed from the envelope contents, never taken on trust.
 */
export function decodeTransaction(tx: Transaction): LedgerTransaction {
  if (!hexKeySchema.safeParse(tx.senderPubKey).success) {
    throw new LedgerError("MalformedTransaction", "Malformed sender public key");
  }
  const envelope: Envelope = { hash: calculateTxId(tx), signer: tx.senderPubKey };
  switch (tx.type) {
    case TxType.CreateWallet:
      return { ...envelope, kind: TxType.CreateWallet, payload: parsePayload(createWalletSchema, tx.payload, tx.type) };
    case TxType.Issue:
      return { ...envelope, kind: TxType.Issue, payload: parsePayload(issueSchema, tx.payload, tx.type) };
    case TxType.Transfer:
      return { ...envelope, kind: TxType.Transfer, payload: parsePayload(transferSchema, tx.payload, tx.type) };
    case TxType.Approve:
      return { ...envelope, kind: TxType.Approve, payload: parsePayload(approveSchema, tx.payload, tx.type) };
    default:
      throw new LedgerError("MalformedTransaction", `Unknown transaction type: ${String(tx.type)}`);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled transaction kind: ${String(value)}`);
}
