export * from "./errors";
export * from "./uint64";
export * from "./wallet";
export * from "./transactions";
export * from "./history";
export * from "./policy";
export * from "./store";
export * from "./dedup";
export * from "./validator";
export * from "./engine";
export * from "./state-machine";
export * from "./builders";
export * from "./api";
