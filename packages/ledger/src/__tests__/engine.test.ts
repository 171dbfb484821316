import { beforeEach, describe, expect, it } from "vitest";
import { ExecutionEngine } from "../engine";
import { foldHistory } from "../history";
import { thirdPartyApprover } from "../policy";
import { LedgerStore } from "../store";
import { LedgerTransaction } from "../transactions";
import { ALICE, approveTx, BOB, CAROL, createWalletTx, issueTx, transferTx } from "./helpers";

function expectConserved(store: LedgerStore): void {
  const totals = store.totals();
  expect(totals.balances + totals.retained).toBe(totals.issued);
  for (const wallet of store.listWallets()) {
    expect(wallet.balance >= 0n).toBe(true);
    expect(wallet.retainedAmount >= 0n).toBe(true);
  }
}

describe("ExecutionEngine", () => {
  let store: LedgerStore;
  let engine: ExecutionEngine;

  const run = (tx: LedgerTransaction) => engine.execute(store, tx);

  beforeEach(() => {
    store = new LedgerStore();
    engine = new ExecutionEngine();
  });

  it("creates a wallet and issues currency to it", () => {
    const create = createWalletTx(ALICE, "Alice");
    const mint = issueTx(ALICE, 100);

    expect(run(create)).toEqual({ type: "success" });
    expect(run(mint)).toEqual({ type: "success" });

    const alice = store.getWallet(ALICE);
    expect(alice?.name).toBe("Alice");
    expect(alice?.balance).toBe(100n);
    expect(alice?.retainedAmount).toBe(0n);
    expect(alice?.historyLen).toBe(2);
    expect(alice?.historyHash).toBe(foldHistory([create.hash, mint.hash]));
    expect(store.totalIssued()).toBe(100n);
  });

  describe("with Alice holding 100 and Bob and Carol registered", () => {
    beforeEach(() => {
      run(createWalletTx(ALICE, "Alice"));
      run(issueTx(ALICE, 100));
      run(createWalletTx(BOB, "Bob"));
      run(createWalletTx(CAROL, "Carol"));
    });

    it("moves a transfer amount into escrow", () => {
      const tx = transferTx(ALICE, { to: BOB, approver: ALICE, amount: 40 });

      expect(run(tx)).toEqual({ type: "success" });

      expect(store.getWallet(ALICE)?.balance).toBe(60n);
      expect(store.getWallet(ALICE)?.retainedAmount).toBe(40n);
      expect(store.getWallet(BOB)?.balance).toBe(0n);
      expect(store.getPending(tx.hash)).toEqual({
        txHash: tx.hash,
        from: ALICE,
        to: BOB,
        approver: ALICE,
        amount: 40n,
        status: "pending"
      });
      expect(store.getHistory(ALICE)).toHaveLength(3);
      expect(store.getHistory(BOB)).toHaveLength(1);
    });

    it("releases escrow to the receiver on approval", () => {
      const tx = transferTx(ALICE, { to: BOB, approver: ALICE, amount: 40 });
      run(tx);
      const approval = approveTx(ALICE, { transferTxHash: tx.hash });

      expect(run(approval)).toEqual({ type: "success" });

      expect(store.getWallet(ALICE)?.balance).toBe(60n);
      expect(store.getWallet(ALICE)?.retainedAmount).toBe(0n);
      expect(store.getWallet(BOB)?.balance).toBe(40n);
      expect(store.getPending(tx.hash)?.status).toBe("finalized");
      expect(store.getPending(tx.hash)?.approvedBy).toBe(approval.hash);
      expect(store.getHistory(ALICE).slice(-2)).toEqual([tx.hash, approval.hash]);
      expect(store.getHistory(BOB).slice(-1)).toEqual([approval.hash]);
    });

    it("rejects a zero transfer without touching state", () => {
      const before = store.stateHash();

      const status = run(transferTx(ALICE, { to: BOB, approver: ALICE, amount: 0 }));

      expect(status).toEqual({
        type: "error",
        code: 2,
        name: "InvalidAmount",
        description: "Transferred amount must be positive"
      });
      expect(store.stateHash()).toBe(before);
    });

    it("rejects a transfer above the balance", () => {
      run(transferTx(ALICE, { to: BOB, approver: ALICE, amount: 40 }));
      const before = store.stateHash();

      const status = run(transferTx(ALICE, { to: BOB, approver: ALICE, amount: 1000, seed: 1 }));

      expect(status).toMatchObject({ type: "error", code: 3, name: "InsufficientFunds" });
      expect(store.getWallet(ALICE)?.balance).toBe(60n);
      expect(store.stateHash()).toBe(before);
    });

    it("finalizes a transfer at most once", () => {
      const tx = transferTx(ALICE, { to: BOB, approver: ALICE, amount: 40 });
      run(tx);

      expect(run(approveTx(ALICE, { transferTxHash: tx.hash }))).toEqual({ type: "success" });
      expect(run(approveTx(ALICE, { transferTxHash: tx.hash, seed: 1 }))).toMatchObject({
        code: 5,
        name: "TransferAlreadyFinalized"
      });
      expect(store.getWallet(BOB)?.balance).toBe(40n);
    });

    it("rejects a replayed issue as a duplicate", () => {
      const mint = issueTx(ALICE, 5, 7);

      expect(run(mint)).toEqual({ type: "success" });
      expect(run(mint)).toEqual({
        type: "error",
        code: 7,
        name: "DuplicateTransaction",
        description: "Transaction was already applied"
      });
      expect(store.getWallet(ALICE)?.balance).toBe(105n);
    });

    it("rejects a replayed transfer as a duplicate", () => {
      const tx = transferTx(ALICE, { to: BOB, approver: CAROL, amount: 10 });

      expect(run(tx)).toEqual({ type: "success" });
      expect(run(tx)).toMatchObject({ code: 7, name: "DuplicateTransaction" });
      expect(store.getWallet(ALICE)?.balance).toBe(90n);
      expect(store.getWallet(ALICE)?.retainedAmount).toBe(10n);
    });

    it("accepts the same transfer again under a different seed", () => {
      expect(run(transferTx(ALICE, { to: BOB, approver: ALICE, amount: 10, seed: 1 }))).toEqual({ type: "success" });
      expect(run(transferTx(ALICE, { to: BOB, approver: ALICE, amount: 10, seed: 2 }))).toEqual({ type: "success" });
      expect(store.getWallet(ALICE)?.retainedAmount).toBe(20n);
    });

    it("lets only the named approver finalize", () => {
      const tx = transferTx(ALICE, { to: BOB, approver: CAROL, amount: 25 });
      run(tx);

      expect(run(approveTx(BOB, { transferTxHash: tx.hash }))).toMatchObject({ code: 6, name: "UnauthorizedApprover" });
      expect(run(approveTx(CAROL, { transferTxHash: tx.hash }))).toEqual({ type: "success" });
      expect(store.getWallet(BOB)?.balance).toBe(25n);
    });
  });

  it("conserves currency across a mixed sequence", () => {
    const txs: LedgerTransaction[] = [
      createWalletTx(ALICE, "Alice"),
      createWalletTx(BOB, "Bob"),
      createWalletTx(CAROL, "Carol"),
      issueTx(ALICE, 500),
      issueTx(BOB, 70),
      transferTx(ALICE, { to: BOB, approver: CAROL, amount: 120 }),
      transferTx(BOB, { to: CAROL, approver: BOB, amount: 70 }),
      transferTx(CAROL, { to: ALICE, approver: CAROL, amount: 1 }),
      issueTx(ALICE, 0, 1),
      transferTx(ALICE, { to: CAROL, approver: ALICE, amount: 380, seed: 3 }),
      transferTx(ALICE, { to: CAROL, approver: ALICE, amount: 1, seed: 4 })
    ];
    const transfers = txs.filter((tx) => tx.kind === "transfer");

    for (const tx of txs) {
      run(tx);
      expectConserved(store);
    }
    for (const tx of transfers) {
      const pending = store.getPending(tx.hash);
      if (!pending) continue;
      run(approveTx(pending.approver, { transferTxHash: tx.hash }));
      expectConserved(store);
    }

    expect(store.totals()).toEqual({ issued: 570n, balances: 570n, retained: 0n });
    expect(store.getWallet(ALICE)?.balance).toBe(0n);
    expect(store.getWallet(BOB)?.balance).toBe(120n);
    expect(store.getWallet(CAROL)?.balance).toBe(450n);
  });

  it("ties the history hash to every past entry", () => {
    run(createWalletTx(ALICE, "Alice"));
    run(issueTx(ALICE, 1, 1));
    run(issueTx(ALICE, 2, 2));
    const entries = [...store.getHistory(ALICE)];
    const head = store.getWallet(ALICE)?.historyHash;

    expect(foldHistory(entries)).toBe(head);
    for (let i = 0; i < entries.length; i++) {
      const flipped = [...entries];
      flipped[i] = (flipped[i][0] === "0" ? "1" : "0") + flipped[i].slice(1);
      expect(foldHistory(flipped)).not.toBe(head);
    }
  });

  it("applies the approval policy override", () => {
    engine = new ExecutionEngine({ approvalPolicy: thirdPartyApprover });
    run(createWalletTx(ALICE, "Alice"));
    run(issueTx(ALICE, 10));
    run(createWalletTx(BOB, "Bob"));

    expect(run(transferTx(ALICE, { to: BOB, approver: ALICE, amount: 5 }))).toMatchObject({ code: 6 });
    expect(run(transferTx(ALICE, { to: BOB, approver: CAROL, amount: 5 }))).toEqual({ type: "success" });
  });

  it("requires a registered approver by default", () => {
    run(createWalletTx(ALICE, "Alice"));
    run(issueTx(ALICE, 10));
    run(createWalletTx(BOB, "Bob"));
    const before = store.stateHash();

    expect(store.approvalPolicy).toBe("registered");
    expect(run(transferTx(ALICE, { to: BOB, approver: "ee".repeat(32), amount: 5 }))).toEqual({
      type: "error",
      code: 6,
      name: "UnauthorizedApprover",
      description: "Approver is not allowed by the approval policy"
    });
    expect(store.stateHash()).toBe(before);
    expect(run(transferTx(ALICE, { to: BOB, approver: BOB, amount: 5 }))).toEqual({ type: "success" });
  });

  it("follows the policy named by the store", () => {
    store = new LedgerStore("any");
    run(createWalletTx(ALICE, "Alice"));
    run(issueTx(ALICE, 10));
    run(createWalletTx(BOB, "Bob"));

    expect(run(transferTx(ALICE, { to: BOB, approver: CAROL, amount: 5 }))).toEqual({ type: "success" });
  });
});
