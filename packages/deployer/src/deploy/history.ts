import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger } from "@agentport/shared";
import type { DeploymentRecord } from "@agentport/shared";

interface DeploymentRow {
  id: number;
  handle: string;
  display_name: string;
  source_root: string;
  entrypoint: string;
  project_id: string;
  region: string;
  created_at: string;
}

function toRecord(row: DeploymentRow): DeploymentRecord {
  return {
    id: row.id,
    handle: row.handle,
    displayName: row.display_name,
    sourceRoot: row.source_root,
    entrypoint: row.entrypoint,
    projectId: row.project_id,
    region: row.region,
    createdAt: row.created_at,
  };
}

/**
 * DeploymentHistory records the remote handle of every successful deploy in
 * SQLite so the registration step can pick up the latest one.
 * Uses WAL journal mode; pass ":memory:" for a throwaway store.
 */
export class DeploymentHistory {
  private db: Database.Database;
  private logger = createLogger("deployment-history");
  private insertStmt: Database.Statement<[string, string, string, string, string, string, string]>;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS deployments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        handle TEXT NOT NULL,
        display_name TEXT NOT NULL,
        source_root TEXT NOT NULL,
        entrypoint TEXT NOT NULL,
        project_id TEXT NOT NULL,
        region TEXT NOT NULL,
        created_at TEXT NOT NULL
      )
    `);
    this.insertStmt = this.db.prepare(
      `INSERT INTO deployments (handle, display_name, source_root, entrypoint, project_id, region, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
    this.logger.debug(`Deployment history at ${dbPath}`);
  }

  record(entry: Omit<DeploymentRecord, "id" | "createdAt">, createdAt = new Date().toISOString()): DeploymentRecord {
    const info = this.insertStmt.run(
      entry.handle,
      entry.displayName,
      entry.sourceRoot,
      entry.entrypoint,
      entry.projectId,
      entry.region,
      createdAt,
    );
    return { ...entry, id: Number(info.lastInsertRowid), createdAt };
  }

  latest(): DeploymentRecord | undefined {
    const row = this.db
      .prepare<[], DeploymentRow>("SELECT * FROM deployments ORDER BY id DESC LIMIT 1")
      .get();
    return row ? toRecord(row) : undefined;
  }

  list(limit = 20): DeploymentRecord[] {
    return this.db
      .prepare<[number], DeploymentRow>("SELECT * FROM deployments ORDER BY id DESC LIMIT ?")
      .all(limit)
      .map(toRecord);
  }

  close(): void {
    this.db.close();
  }
}
