import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { LOG_LEVELS } from "./runtime/logger.js";
import type { LogLevel } from "./runtime/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Contracts live at the repository root in development
export const DEFAULT_CONTRACTS_DIR = path.resolve(__dirname, "..", "..", "..", "contracts");

const envSchema = z.object({
  MBO_SOLVER_MAX_ITERATIONS: z.coerce.number().int().min(1).max(1000).default(50),
  MBO_SOLVER_TOLERANCE: z.coerce.number().positive().default(0.01),
  MBO_BALANCE_TOLERANCE: z.coerce.number().positive().default(1.0),
  MBO_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CONTRACTS_DIR: z.string().min(1).optional(),
});

export interface ModelConfig {
  solverMaxIterations: number;
  solverTolerance: number;
  balanceTolerance: number;
  logLevel: LogLevel;
  contractsDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ModelConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${details.join("; ")}`);
  }

  return {
    solverMaxIterations: parsed.data.MBO_SOLVER_MAX_ITERATIONS,
    solverTolerance: parsed.data.MBO_SOLVER_TOLERANCE,
    balanceTolerance: parsed.data.MBO_BALANCE_TOLERANCE,
    logLevel: parsed.data.MBO_LOG_LEVEL,
    contractsDir: parsed.data.CONTRACTS_DIR ?? DEFAULT_CONTRACTS_DIR,
  };
}
