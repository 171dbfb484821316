export * from "./types";
export * from "./hash";
export * from "./crypto";
export * from "./mempool";
export * from "./logger";
export * from "./config";
export * from "./memory-store";
export * from "./server";
export * from "./node";
