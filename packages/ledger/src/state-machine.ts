import { z } from "zod";
import {
  ed25519Verifier,
  GenesisData,
  JsonValue,
  parseWith,
  SignatureVerifier,
  StateMachine,
  Transaction
} from "@tillchain/core";
import { ExecutionEngine } from "./engine";
import { LedgerError } from "./errors";
import { APPROVAL_POLICY_NAMES, ApprovalPolicy, DEFAULT_APPROVAL_POLICY } from "./policy";
import { LedgerStore } from "./store";
import { decodeTransaction, LedgerTransaction } from "./transactions";

const ledgerAppStateSchema = z
  .object({
    approvalPolicy: z.enum(APPROVAL_POLICY_NAMES).default(DEFAULT_APPROVAL_POLICY)
  })
  .passthrough();

function tryDecode(tx: Transaction): LedgerTransaction | LedgerError {
  try {
    return decodeTransaction(tx);
  } catch (err) {
    if (err instanceof LedgerError) return err;
    throw err;
  }
}

export interface LedgerStateMachineOptions {
  verifier?: SignatureVerifier;
  /** Replaces the policy named in genesis. Every replica must use the same one. */
  approvalPolicy?: ApprovalPolicy;
}

export function createLedgerStateMachine(options: LedgerStateMachineOptions = {}): StateMachine<LedgerStore> {
  const verifier = options.verifier ?? ed25519Verifier;
  const engine = new ExecutionEngine({ approvalPolicy: options.approvalPolicy });

  return {
    name: "ledger",
    initState(genesis: GenesisData): LedgerStore {
      const app = parseWith(ledgerAppStateSchema, genesis.appState ?? {}, "genesis appState");
      return new LedgerStore(app.approvalPolicy);
    },
    restoreState(snapshot: JsonValue): LedgerStore {
      return LedgerStore.fromSnapshot(snapshot);
    },
    exportState(state: LedgerStore): JsonValue {
      return state.toSnapshot();
    },
    cloneState(state: LedgerStore): LedgerStore {
      return state.clone();
    },
    stateHash(state: LedgerStore): string {
      return state.stateHash();
    },
    async checkTx(tx: Transaction) {
      decodeTransaction(tx);
      const ok = await verifier.verify(tx);
      if (!ok) {
        throw new LedgerError("InvalidSignature");
      }
    },
    async executeTx(state: LedgerStore, tx: Transaction) {
      const decoded = tryDecode(tx);
      if (decoded instanceof LedgerError) {
        return decoded.toStatus();
      }
      if (!(await verifier.verify(tx))) {
        return new LedgerError("InvalidSignature").toStatus();
      }
      return engine.execute(state, decoded);
    }
  };
}

export const LedgerStateMachine = createLedgerStateMachine();

export default LedgerStateMachine;
