import { utils, sign, verify, getPublicKey } from "@noble/ed25519";
import { NodeKey, SignatureVerifier, Transaction } from "./types";

const HEX_KEY = /^[0-9a-f]{64}$/;

export function isHexKey(value: unknown): value is string {
  return typeof value === "string" && HEX_KEY.test(value);
}

export async function generateKeyPair(): Promise<NodeKey> {
  const priv = utils.randomPrivateKey();
  return keyPairFromPrivate(Buffer.from(priv).toString("hex"));
}

export async function keyPairFromPrivate(privKeyHex: string): Promise<NodeKey> {
  const pubHex = Buffer.from(await getPublicKey(Buffer.from(privKeyHex, "hex"))).toString("hex");
  return { privKey: privKeyHex, pubKey: pubHex };
}

export async function signMessage(messageHex: string, privKeyHex: string): Promise<string> {
  const privBytes = Buffer.from(privKeyHex, "hex");
  const sig = await sign(Buffer.from(messageHex, "hex"), privBytes);
  return Buffer.from(sig).toString("hex");
}

export async function verifyMessage(messageHex: string, signatureHex: string, pubKeyHex: string): Promise<boolean> {
  const msg = Buffer.from(messageHex, "hex");
  const sig = Buffer.from(signatureHex, "hex");
  const pub = Buffer.from(pubKeyHex, "hex");
  try {
    return await verify(sig, msg, pub);
  } catch {
    // malformed points or signature lengths are plain verification failures
    return false;
  }
}

/** Checks the envelope signature over the transaction id. */
export const ed25519Verifier: SignatureVerifier = {
  verify(tx: Transaction): Promise<boolean> {
    if (!isHexKey(tx.senderPubKey) || typeof tx.signature !== "string" || tx.signature.length !== 128) {
      return Promise.resolve(false);
    }
    return verifyMessage(tx.id, tx.signature, tx.senderPubKey);
  }
};
