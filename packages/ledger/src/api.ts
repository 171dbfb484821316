import { Request, Response, Router } from "express";
import { HistoryAccumulator } from "./history";
import { LedgerStore } from "./store";
import { hexKeySchema } from "./uint64";
import { pendingTransferToJson, walletToJson } from "./wallet";

/** Read-only ledger queries mounted next to the node's own routes. */
export function createLedgerRouter(getState: () => LedgerStore | undefined): Router {
  const router = Router();
  const history = new HistoryAccumulator();

  const withState = (res: Response): LedgerStore | undefined => {
    const state = getState();
    if (!state) {
      res.status(503).json({ error: "ledger state not initialized" });
    }
    return state;
  };

  router.get("/wallets", (_req: Request, res: Response) => {
    const state = withState(res);
    if (!state) return;
    res.json(state.listWallets().map(walletToJson));
  });

  router.get("/wallets/:pubKey", (req: Request, res: Response) => {
    const state = withState(res);
    if (!state) return;
    if (!hexKeySchema.safeParse(req.params.pubKey).success) {
      return res.status(400).json({ error: "pubKey must be 64 lowercase hex chars" });
    }
    const wallet = state.getWallet(req.params.pubKey);
    if (!wallet) return res.status(404).json({ error: "Wallet not found" });
    res.json(walletToJson(wallet));
  });

  router.get("/wallets/:pubKey/history", (req: Request, res: Response) => {
    const state = withState(res);
    if (!state) return;
    const wallet = state.getWallet(req.params.pubKey);
    if (!wallet) return res.status(404).json({ error: "Wallet not found" });
    res.json({
      historyLen: wallet.historyLen,
      historyHash: wallet.historyHash,
      entries: state.getHistory(wallet.pubKey)
    });
  });

  router.get("/wallets/:pubKey/proof/:txHash", (req: Request, res: Response) => {
    const state = withState(res);
    if (!state) return;
    const { pubKey, txHash } = req.params;
    if (!state.getWallet(pubKey)) return res.status(404).json({ error: "Wallet not found" });
    const proof = history.proveInclusion(state, pubKey, txHash);
    if (!proof) return res.status(404).json({ error: "Transaction not in wallet history" });
    res.json({ proof, verified: history.verifyInclusion(state, pubKey, txHash, proof) });
  });

  router.get("/transfers/:txHash", (req: Request, res: Response) => {
    const state = withState(res);
    if (!state) return;
    const transfer = state.getPending(req.params.txHash);
    if (!transfer) return res.status(404).json({ error: "Transfer not found" });
    res.json(pendingTransferToJson(transfer));
  });

  router.get("/supply", (_req: Request, res: Response) => {
    const state = withState(res);
    if (!state) return;
    const totals = state.totals();
    res.json({
      issued: totals.issued.toString(),
      balances: totals.balances.toString(),
      retained: totals.retained.toString()
    });
  });

  return router;
}
