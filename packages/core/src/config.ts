import fs from "fs";
import path from "path";
import YAML from "yaml";
import { z } from "zod";

export class ConfigValidationError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: z.ZodIssue[]
  ) {
    const message = issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`).join("\n");
    super(`Invalid configuration in ${source}:\n${message}`);
    this.name = "ConfigValidationError";
  }
}

const hexKey = z.string().regex(/^[0-9a-f]{64}$/, "expected 64 lowercase hex chars");

export const validatorSchema = z.object({
  name: z.string().min(1),
  pubKey: hexKey
});

export const sequencerConfigSchema = z.object({
  type: z.enum(["solo", "round-robin"]),
  validators: z.array(validatorSchema).min(1)
});

export const nodeConfigFileSchema = z.object({
  chainId: z.string().min(1),
  stateMachine: z.string().min(1).default("ledger"),
  genesis: z.string().min(1),
  key: z.string().min(1),
  sequencer: sequencerConfigSchema,
  api: z
    .object({
      port: z.number().int().min(0).max(65535),
      host: z.string().optional()
    })
    .optional(),
  blockTimeMs: z.number().int().positive().optional(),
  maxTxsPerBlock: z.number().int().positive().optional(),
  storage: z.string().optional()
});

export const genesisSchema = z.object({
  chainId: z.string().min(1),
  validators: z.array(validatorSchema).min(1),
  appState: z.record(z.unknown()).optional()
});

export const nodeKeySchema = z.object({
  pubKey: hexKey,
  privKey: hexKey
});

export type NodeConfigFile = z.infer<typeof nodeConfigFileSchema>;
export type SequencerConfig = z.infer<typeof sequencerConfigSchema>;

export function readJSONMaybeYAML(file: string): unknown {
  const raw = fs.readFileSync(file, "utf-8");
  if (file.endsWith(".yaml") || file.endsWith(".yml")) {
    return YAML.parse(raw);
  }
  return JSON.parse(raw);
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, source: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(source, result.error.issues);
  }
  return result.data;
}

export interface ResolvedConfigFile {
  config: NodeConfigFile;
  baseDir: string;
  genesisPath: string;
  keyPath: string;
  dataDir: string;
}

/** Loads a node config file and resolves its relative paths against the file's directory. */
export function loadConfigFile(configPath: string): ResolvedConfigFile {
  const abs = path.resolve(configPath);
  const config = parseWith(nodeConfigFileSchema, readJSONMaybeYAML(abs), abs);
  const baseDir = path.dirname(abs);
  return {
    config,
    baseDir,
    genesisPath: path.resolve(baseDir, config.genesis),
    keyPath: path.resolve(baseDir, config.key),
    dataDir: path.resolve(baseDir, config.storage ?? "./data")
  };
}
