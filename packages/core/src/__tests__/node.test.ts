import { describe, expect, it } from "vitest";
import { hashObject } from "../hash";
import { MemoryBlockStore } from "../memory-store";
import { ChainNode } from "../node";
import { ExecutionStatus, GenesisData, JsonValue, Sequencer, StateMachine, Transaction, Validator } from "../types";

interface CounterState {
  value: number;
}

function amountOf(tx: Transaction): number {
  const amount = tx.payload.amount;
  return typeof amount === "number" ? amount : 1;
}

const counter: StateMachine<CounterState> = {
  name: "counter",
  initState(genesis: GenesisData): CounterState {
    const initial = genesis.appState?.value;
    return { value: typeof initial === "number" ? initial : 0 };
  },
  restoreState(snapshot: JsonValue): CounterState {
    if (typeof snapshot === "object" && snapshot !== null && !Array.isArray(snapshot) && typeof snapshot.value === "number") {
      return { value: snapshot.value };
    }
    throw new Error("Invalid counter snapshot");
  },
  exportState(state: CounterState): JsonValue {
    return { value: state.value };
  },
  stateHash(state: CounterState): string {
    return hashObject(state);
  },
  checkTx(tx: Transaction) {
    if (tx.type !== "inc" && tx.type !== "dec") {
      throw new Error("Invalid tx type for counter");
    }
  },
  executeTx(state: CounterState, tx: Transaction): ExecutionStatus {
    const amount = amountOf(tx);
    if (tx.type === "dec" && state.value < amount) {
      return { type: "error", code: 1, name: "Underflow", description: "Counter would go below zero" };
    }
    state.value += tx.type === "inc" ? amount : -amount;
    return { type: "success" };
  }
};

const validator: Validator = { name: "validator", pubKey: "0f".repeat(32) };
const key = { pubKey: validator.pubKey, privKey: "0e".repeat(32) };

const sequencer: Sequencer = {
  type: "solo",
  getProposer: () => validator,
  isProposer: (pubKey) => pubKey === validator.pubKey,
  validators: () => [validator]
};

function counterTx(type: "inc" | "dec", amount: number, nonce: number): Transaction {
  return { id: "", type, payload: { amount, nonce }, senderPubKey: validator.pubKey, signature: "" };
}

function makeNode(storage = new MemoryBlockStore()): ChainNode<CounterState> {
  return new ChainNode<CounterState>({
    chainId: "counter-test",
    genesis: { chainId: "counter-test", validators: [validator], appState: { value: 5 } },
    sequencer,
    stateMachine: counter,
    key,
    storage
  });
}

describe("ChainNode", () => {
  it("stores a genesis block and state at height 0", async () => {
    const node = makeNode();
    await node.init();

    expect(node.getHeight()).toBe(0);
    expect(node.getState()).toEqual({ value: 5 });
    expect(await node.getBlock(0)).toMatchObject({
      height: 0,
      timestamp: 0,
      prevHash: null,
      stateHash: hashObject({ value: 5 }),
      proposerPubKey: validator.pubKey
    });
    expect(await node.exportSnapshot()).toMatchObject({ chainId: "counter-test", height: 0, state: { value: 5 } });
  });

  it("executes a block against a copy and keeps rejected transactions out of the state", async () => {
    const node = makeNode();
    await node.init();
    const before = node.getState();
    for (const tx of [counterTx("inc", 3, 1), counterTx("dec", 100, 2), counterTx("dec", 2, 3)]) {
      await node.addTransaction(tx);
    }

    const block = await node.proposeBlock();

    expect(block?.prevHash).toBe((await node.getBlock(0))?.blockHash);
    expect(node.getState()).toEqual({ value: 6 });
    expect(before).toEqual({ value: 5 });
    const receipts = await Promise.all((block?.txs ?? []).map((tx) => node.getReceipt(tx.id)));
    expect(receipts.map((receipt) => receipt?.status.type)).toEqual(["success", "error", "success"]);
    expect(await node.getStateAtHeight(0)).toEqual({ height: 0, state: { value: 5 } });
    expect(await node.getStateAtHeight(1)).toEqual({ height: 1, state: { value: 6 } });
  });

  it("refuses transactions the state machine does not admit", async () => {
    const node = makeNode();
    await node.init();
    await expect(node.addTransaction({ ...counterTx("inc", 1, 1), type: "reset" })).rejects.toThrowError(
      "Invalid tx type for counter"
    );
    expect((await node.addTransaction(counterTx("inc", 1, 1))).accepted).toBe(true);
    expect((await node.addTransaction(counterTx("inc", 1, 1))).accepted).toBe(false);
  });

  it("restores the latest state from storage", async () => {
    const storage = new MemoryBlockStore();
    const first = makeNode(storage);
    await first.init();
    await first.addTransaction(counterTx("inc", 10, 1));
    await first.proposeBlock();

    const second = makeNode(storage);
    await second.init();

    expect(second.getHeight()).toBe(1);
    expect(second.getState()).toEqual({ value: 15 });
  });

  it("exports a bounded range of blocks", async () => {
    const node = makeNode();
    await node.init();
    for (let nonce = 1; nonce <= 3; nonce++) {
      await node.createAndCommitBlock([counterTx("inc", 1, nonce)]);
    }

    expect((await node.getBlocks(1, 10)).map((block) => block.height)).toEqual([1, 2, 3]);
    expect(node.getStatus()).toEqual({
      chainId: "counter-test",
      height: 3,
      mempool: 0,
      sequencer: "solo",
      validators: [validator.pubKey]
    });
  });
});
