import crypto from "crypto";
import stringify from "json-stable-stringify";
import { BlockDraft, Transaction, UnsignedTransaction } from "./types";

export const ZERO_HASH = "0".repeat(64);

export function canonicalJson(value: unknown): string {
  return stringify(value) ?? "";
}

export function hashObject(value: unknown): string {
  const input = canonicalJson(value);
  return crypto.createHash("sha256").update(input).digest("hex");
}

/** SHA-256 over the concatenated bytes of hex-encoded inputs. */
export function hashHex(...parts: string[]): string {
  const hash = crypto.createHash("sha256");
  for (const part of parts) {
    hash.update(Buffer.from(part, "hex"));
  }
  return hash.digest("hex");
}

export function calculateTxId(tx: UnsignedTransaction | Transaction): string {
  return hashObject({
    type: tx.type,
    payload: tx.payload,
    senderPubKey: tx.senderPubKey
  });
}

export function calculateBlockHash(block: BlockDraft): string {
  return hashObject({
    height: block.height,
    timestamp: block.timestamp,
    prevHash: block.prevHash,
    txs: block.txs,
    stateHash: block.stateHash,
    proposerPubKey: block.proposerPubKey
  });
}
