import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ApiServer, ChainNode, keyPairFromPrivate, MemoryBlockStore, NodeKey, startApiServer, Transaction } from "@tillchain/core";
import { createLedgerRouter } from "../api";
import { createWallet, issue, transfer } from "../builders";
import { foldHistory } from "../history";
import { createLedgerStateMachine } from "../state-machine";
import { LedgerStore } from "../store";

describe("ledger HTTP API", () => {
  let node: ChainNode<LedgerStore>;
  let server: ApiServer;
  let validator: NodeKey;
  let alice: NodeKey;
  let bob: NodeKey;
  let history: Transaction[];

  const url = (route: string) => `http://127.0.0.1:${server.port}${route}`;
  const get = async (route: string) => {
    const res = await fetch(url(route));
    return { status: res.status, body: await res.json() };
  };

  beforeAll(async () => {
    validator = await keyPairFromPrivate("0a".repeat(32));
    alice = await keyPairFromPrivate("01".repeat(32));
    bob = await keyPairFromPrivate("02".repeat(32));
    const self = { name: "validator", pubKey: validator.pubKey };
    node = new ChainNode<LedgerStore>({
      chainId: "tillchain-api",
      genesis: { chainId: "tillchain-api", validators: [self] },
      sequencer: {
        type: "solo",
        getProposer: () => self,
        isProposer: (pubKey) => pubKey === self.pubKey,
        validators: () => [self]
      },
      stateMachine: createLedgerStateMachine(),
      key: validator,
      storage: new MemoryBlockStore()
    });
    await node.init();
    history = [await createWallet(alice, "Alice"), await issue(alice, 100)];
    for (const tx of [...history, await createWallet(bob, "Bob")]) {
      await node.addTransaction(tx);
    }
    await node.proposeBlock();
    server = await startApiServer(node, { port: 0, host: "127.0.0.1" }, [createLedgerRouter(() => node.getState())]);
  });

  afterAll(async () => {
    await server.stop();
    await node.stop();
  });

  it("reports node status", async () => {
    expect(await get("/status")).toEqual({
      status: 200,
      body: { chainId: "tillchain-api", height: 1, mempool: 0, sequencer: "solo", validators: [validator.pubKey] }
    });
  });

  it("serves a wallet with decimal amounts", async () => {
    expect(await get(`/wallets/${alice.pubKey}`)).toEqual({
      status: 200,
      body: {
        pubKey: alice.pubKey,
        name: "Alice",
        balance: "100",
        retainedAmount: "0",
        historyLen: 2,
        historyHash: foldHistory(history.map((tx) => tx.id))
      }
    });
  });

  it("validates wallet keys", async () => {
    expect((await get("/wallets/not-a-key")).status).toBe(400);
    expect(await get(`/wallets/${"ee".repeat(32)}`)).toEqual({ status: 404, body: { error: "Wallet not found" } });
  });

  it("serves history with a verifiable inclusion proof", async () => {
    expect((await get(`/wallets/${alice.pubKey}/history`)).body).toEqual({
      historyLen: 2,
      historyHash: foldHistory(history.map((tx) => tx.id)),
      entries: history.map((tx) => tx.id)
    });
    expect((await get(`/wallets/${alice.pubKey}/proof/${history[0].id}`)).body).toEqual({
      proof: { index: 0, prefixHash: "0".repeat(64), suffix: [history[1].id] },
      verified: true
    });
    expect((await get(`/wallets/${alice.pubKey}/proof/${"ee".repeat(32)}`)).status).toBe(404);
  });

  it("admits a transaction and serves its receipt and transfer once committed", async () => {
    const tx = await transfer(alice, { to: bob.pubKey, approver: alice.pubKey, amount: 30 });

    const res = await fetch(url("/tx"), {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(tx)
    });
    expect(await res.json()).toEqual({ ok: true, id: tx.id, accepted: true });
    expect((await get(`/tx/${tx.id}`)).status).toBe(404);

    await node.proposeBlock();

    expect((await get(`/tx/${tx.id}`)).body).toEqual({ txId: tx.id, height: 2, index: 0, status: { type: "success" } });
    expect((await get(`/transfers/${tx.id}`)).body).toEqual({
      txHash: tx.id,
      from: alice.pubKey,
      to: bob.pubKey,
      approver: alice.pubKey,
      amount: "30",
      status: "pending",
      approvedBy: null
    });
    expect((await get("/supply")).body).toEqual({ issued: "100", balances: "70", retained: "30" });
  });

  it("refuses a transaction with a bad signature", async () => {
    const tx = await issue(alice, 1, 99);
    const res = await fetch(url("/tx"), {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ ...tx, signature: "00".repeat(64) })
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: "Invalid signature" });
  });

  it("serves blocks and the snapshot export", async () => {
    const genesisBlock = await get("/block/0");
    expect(genesisBlock.body).toMatchObject({ height: 0, prevHash: null, txs: [] });
    expect((await get("/block/latest")).body).toMatchObject({ height: node.getHeight() });
    expect((await get("/block/-1")).status).toBe(400);
    expect((await get("/export/blocks?from=2&to=1")).status).toBe(400);
    expect((await get("/export/snapshot?height=1")).body).toMatchObject({ chainId: "tillchain-api", height: 1 });
  });
});
