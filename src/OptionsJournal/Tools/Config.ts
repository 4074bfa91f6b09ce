/**
 * Config.ts — Journal directory and Data/JournalConfig.yaml
 *
 * Every setting has a default, so a missing file is fine. Relative paths are
 * resolved against the journal directory.
 */

import { existsSync, readFileSync } from "fs";
import { dirname, isAbsolute, join, resolve } from "path";
import { fileURLToPath } from "url";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { StorageError, ValidationError } from "./Errors";
import type { DBConfig } from "./JournalDB";

// ─── Schema ──────────────────────────────────────────────────────────────────

export const JournalConfigSchema = z.object({
  paths: z.object({
    transactions: z.string().default("Data/Transactions"),
    strategies: z.string().default("Data/Strategies"),
    archive: z.string().default("Data/Archive"),
    logs: z.string().default("Data/Logs"),
    positions_csv: z.string().default("Data/positions.csv"),
    closed_summary: z.string().default("Data/closed_trades.csv"),
  }).default({}),
  database: z.object({
    provider: z.enum(["sqlite", "none"]).default("sqlite"),
    sqlite_path: z.string().default("Data/journal.db"),
  }).default({}),
  import: z.object({
    auto_approve: z.boolean().default(false),
  }).default({}),
});

export type JournalConfigFile = z.infer<typeof JournalConfigSchema>;

export interface JournalConfig {
  journalDir: string;
  paths: JournalConfigFile["paths"];
  dbConfig: DBConfig;
  autoApprove: boolean;
}

export const CONFIG_FILE = join("Data", "JournalConfig.yaml");

// ─── Loading ─────────────────────────────────────────────────────────────────

/** Tools/.. : the directory holding Data/ */
export function getJournalDir(): string {
  const toolsDir = dirname(fileURLToPath(import.meta.url));
  return resolve(toolsDir, "..");
}

function resolvePath(journalDir: string, p: string): string {
  return isAbsolute(p) ? p : join(journalDir, p);
}

export function parseConfig(raw: unknown, journalDir: string): JournalConfig {
  const result = JournalConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `config ${issue ? issue.path.join(".") : ""}`.trim(),
      issue ? issue.message : "invalid configuration",
    );
  }

  const { paths, database } = result.data;
  return {
    journalDir,
    paths: {
      transactions: resolvePath(journalDir, paths.transactions),
      strategies: resolvePath(journalDir, paths.strategies),
      archive: resolvePath(journalDir, paths.archive),
      logs: resolvePath(journalDir, paths.logs),
      positions_csv: resolvePath(journalDir, paths.positions_csv),
      closed_summary: resolvePath(journalDir, paths.closed_summary),
    },
    dbConfig: {
      provider: database.provider,
      sqlite_path: resolvePath(journalDir, database.sqlite_path),
    },
    autoApprove: result.data.import.auto_approve,
  };
}

export function loadConfig(journalDir: string = getJournalDir()): JournalConfig {
  const configPath = join(journalDir, CONFIG_FILE);
  if (!existsSync(configPath)) return parseConfig({}, journalDir);

  let raw: unknown;
  try {
    raw = yamlParse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new StorageError(configPath, "read config", err);
  }
  return parseConfig(raw, journalDir);
}
