import { afterEach, describe, it, expect } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { loadConfig, parseConfig } from "../Config";
import { StorageError, ValidationError } from "../Errors";
import { tempDir } from "./fixtures";

describe("parseConfig", () => {
  it("fills every default relative to the journal directory", () => {
    expect(parseConfig({}, "/journal")).toEqual({
      journalDir: "/journal",
      paths: {
        transactions: "/journal/Data/Transactions",
        strategies: "/journal/Data/Strategies",
        archive: "/journal/Data/Archive",
        logs: "/journal/Data/Logs",
        positions_csv: "/journal/Data/positions.csv",
        closed_summary: "/journal/Data/closed_trades.csv",
      },
      dbConfig: { provider: "sqlite", sqlite_path: "/journal/Data/journal.db" },
      autoApprove: false,
    });
  });

  it("keeps absolute paths and partial sections", () => {
    const config = parseConfig({
      paths: { archive: "/backup/archive" },
      database: { provider: "none" },
      import: { auto_approve: true },
    }, "/journal");

    expect(config.paths.archive).toBe("/backup/archive");
    expect(config.paths.strategies).toBe("/journal/Data/Strategies");
    expect(config.dbConfig).toEqual({ provider: "none", sqlite_path: "/journal/Data/journal.db" });
    expect(config.autoApprove).toBe(true);
  });

  it("treats an empty document as defaults", () => {
    expect(parseConfig(null, "/journal").autoApprove).toBe(false);
  });

  it("rejects unknown providers", () => {
    expect(() => parseConfig({ database: { provider: "postgres" } }, "/journal")).toThrow(ValidationError);
  });
});

describe("loadConfig", () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  it("reads Data/JournalConfig.yaml", () => {
    root = tempDir("journal-config");
    mkdirSync(join(root, "Data"));
    writeFileSync(join(root, "Data", "JournalConfig.yaml"), "paths:\n  transactions: Inbox\nimport:\n  auto_approve: true\n");

    const config = loadConfig(root);
    expect(config.paths.transactions).toBe(join(root, "Inbox"));
    expect(config.autoApprove).toBe(true);
  });

  it("uses defaults when the file is missing", () => {
    root = tempDir("journal-config");
    expect(loadConfig(root).paths.logs).toBe(join(root, "Data", "Logs"));
  });

  it("wraps unreadable YAML in a StorageError", () => {
    root = tempDir("journal-config");
    mkdirSync(join(root, "Data"));
    writeFileSync(join(root, "Data", "JournalConfig.yaml"), "paths: [unclosed\n");
    expect(() => loadConfig(root)).toThrow(StorageError);
  });
});
