import express, { Express, Request, Response, Router } from "express";
import bodyParser from "body-parser";
import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { getLogger } from "./logger";
import { ApiConfig, Block, NewBlockEvent, NodeStatus, StateSnapshot, Transaction, TxReceipt } from "./types";

export interface NodeHandle {
  getStatus(): NodeStatus;
  exportState(): unknown;
  getStateAtHeight(height: number): Promise<{ height: number; state: unknown } | undefined>;
  addTransaction(tx: Transaction): Promise<{ accepted: boolean; id: string }>;
  getBlock(height: number): Promise<Block | undefined>;
  getLatestBlock(): Promise<Block | undefined>;
  getBlocks(from: number, to: number): Promise<Block[]>;
  exportSnapshot(height?: number): Promise<StateSnapshot | undefined>;
  getReceipt(txId: string): Promise<TxReceipt | undefined>;
  on(event: "block", handler: (evt: NewBlockEvent) => void): unknown;
  on(event: "tx", handler: (tx: Transaction) => void): unknown;
  off(event: "block", handler: (evt: NewBlockEvent) => void): unknown;
  off(event: "tx", handler: (tx: Transaction) => void): unknown;
}

export interface ApiServer {
  port: number;
  stop(): Promise<void>;
}

const MAX_EXPORT_RANGE = 200;

function parseHeight(raw: unknown): number | undefined {
  if (typeof raw !== "string" || raw.length === 0) return undefined;
  const height = Number(raw);
  return Number.isInteger(height) && height >= 0 ? height : undefined;
}

export function createApiApp(node: NodeHandle, routers: Router[] = []): Express {
  const app = express();
  const logger = getLogger("api");
  app.use(bodyParser.json());

  app.get("/status", (_req: Request, res: Response) => {
    res.json(node.getStatus());
  });

  app.get("/state", (_req: Request, res: Response) => {
    res.json(node.exportState());
  });

  app.get("/state/:height", async (req: Request, res: Response) => {
    const height = parseHeight(req.params.height);
    if (height === undefined) return res.status(400).json({ error: "height must be >= 0" });
    const snapshot = await node.getStateAtHeight(height);
    if (!snapshot) return res.status(404).json({ error: "state not found" });
    res.json(snapshot);
  });

  app.get("/block/latest", async (_req: Request, res: Response) => {
    const block = await node.getLatestBlock();
    if (!block) return res.status(404).json({ error: "no blocks" });
    res.json(block);
  });

  app.get("/block/:height", async (req: Request, res: Response) => {
    const height = parseHeight(req.params.height);
    if (height === undefined) return res.status(400).json({ error: "height must be >= 0" });
    const block = await node.getBlock(height);
    if (!block) return res.status(404).json({ error: "not found" });
    res.json(block);
  });

  app.post("/tx", async (req: Request, res: Response) => {
    try {
      const result = await node.addTransaction(req.body);
      res.json({ ok: true, id: result.id, accepted: result.accepted });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug({ reason: message }, "Refused transaction");
      res.status(400).json({ ok: false, error: message });
    }
  });

  app.get("/tx/:id", async (req: Request, res: Response) => {
    const receipt = await node.getReceipt(req.params.id);
    if (!receipt) return res.status(404).json({ error: "transaction not found" });
    res.json(receipt);
  });

  app.get("/export/snapshot", async (req: Request, res: Response) => {
    let height: number | undefined;
    if (req.query.height !== undefined) {
      height = parseHeight(req.query.height);
      if (height === undefined) return res.status(400).json({ error: "height must be >= 0" });
    }
    const snapshot = await node.exportSnapshot(height);
    if (!snapshot) return res.status(404).json({ error: "snapshot not found" });
    res.json(snapshot);
  });

  app.get("/export/blocks", async (req: Request, res: Response) => {
    const latestHeight = node.getStatus().height;
    const from = req.query.from !== undefined ? parseHeight(req.query.from) : latestHeight;
    const to = req.query.to !== undefined ? parseHeight(req.query.to) : latestHeight;
    if (from === undefined || to === undefined) {
      return res.status(400).json({ error: "from/to must be >= 0" });
    }
    if (from > to) {
      return res.status(400).json({ error: "from must be <= to" });
    }
    if (to - from > MAX_EXPORT_RANGE) {
      return res.status(400).json({ error: `range too large; max ${MAX_EXPORT_RANGE + 1} blocks` });
    }
    const blocks = await node.getBlocks(from, to);
    res.json({ from, to: Math.min(to, latestHeight), blocks });
  });

  for (const router of routers) {
    app.use(router);
  }

  return app;
}

export async function startApiServer(node: NodeHandle, config: ApiConfig, routers: Router[] = []): Promise<ApiServer> {
  const logger = getLogger("api");
  const server = http.createServer(createApiApp(node, routers));
  const wss = new WebSocketServer({ server, path: "/ws" });

  wss.on("connection", (ws: WebSocket) => {
    ws.send(JSON.stringify({ type: "status", data: node.getStatus() }));
    const blockHandler = (evt: NewBlockEvent) => {
      ws.send(JSON.stringify({ type: "newBlock", data: evt }));
      ws.send(JSON.stringify({ type: "status", data: node.getStatus() }));
    };
    const txHandler = (tx: Transaction) => {
      ws.send(JSON.stringify({ type: "newTx", data: tx }));
    };
    node.on("block", blockHandler);
    node.on("tx", txHandler);
    ws.on("close", () => {
      node.off("block", blockHandler);
      node.off("tx", txHandler);
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host ?? "0.0.0.0", () => resolve());
  });
  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : config.port;
  logger.info({ port, host: config.host ?? "0.0.0.0" }, "API listening");

  return {
    port,
    stop: async () => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  };
}
