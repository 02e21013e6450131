import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

export type StorageDriver = 'json' | 'sqlite';

export const CATALOG_DOCUMENT = 'game_list';
export const SUBSCRIPTIONS_DOCUMENT = 'monitor_list';

/**
 * Holds one named JSON document. `read` resolves null when the document has
 * never been written; implementations never interpret the text.
 */
export interface DocumentBackend {
  readonly location: string;
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
}

export class StorageCorruptError extends Error {
  constructor(
    message: string,
    public readonly location: string,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = 'StorageCorruptError';
  }
}

export function parseJsonDocument(text: string, location: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : 'unknown parse error';
    throw new StorageCorruptError(`Document at ${location} is not valid JSON`, location, detail);
  }
}

export function serializeJsonDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 4)}\n`;
}

export class JsonFileBackend implements DocumentBackend {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(text: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    // Readers never see a half-written file: write beside it, then swap.
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, text, 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }
}

const DOCUMENTS_DDL = `
  CREATE TABLE IF NOT EXISTS documents (
    name TEXT PRIMARY KEY,
    body TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

export class SqliteDocumentBackend implements DocumentBackend {
  private readonly selectStmt: Database.Statement;
  private readonly upsertStmt: Database.Statement;

  constructor(
    private readonly db: Database.Database,
    private readonly name: string,
  ) {
    db.exec(DOCUMENTS_DDL);
    this.selectStmt = db.prepare('SELECT body FROM documents WHERE name = ?');
    this.upsertStmt = db.prepare(
      `
      INSERT INTO documents (name, body, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET body = excluded.body, updated_at = excluded.updated_at
    `,
    );
  }

  get location(): string {
    return `${this.db.name}#${this.name}`;
  }

  async read(): Promise<string | null> {
    const row = this.selectStmt.get(this.name) as { body: string } | undefined;
    return row ? row.body : null;
  }

  async write(text: string): Promise<void> {
    this.upsertStmt.run(this.name, text, new Date().toISOString());
  }
}

export type DocumentBackends = {
  driver: StorageDriver;
  catalog: DocumentBackend;
  subscriptions: DocumentBackend;
  close: () => void;
};

export function openDocumentBackends(options: {
  driver: StorageDriver;
  dataDir: string;
  sqliteFile: string;
}): DocumentBackends {
  if (options.driver === 'json') {
    return {
      driver: 'json',
      catalog: new JsonFileBackend(path.join(options.dataDir, `${CATALOG_DOCUMENT}.json`)),
      subscriptions: new JsonFileBackend(path.join(options.dataDir, `${SUBSCRIPTIONS_DOCUMENT}.json`)),
      close: () => {},
    };
  }

  mkdirSync(path.dirname(options.sqliteFile), { recursive: true });
  const db = new Database(options.sqliteFile);
  db.pragma('journal_mode = WAL');
  return {
    driver: 'sqlite',
    catalog: new SqliteDocumentBackend(db, CATALOG_DOCUMENT),
    subscriptions: new SqliteDocumentBackend(db, SUBSCRIPTIONS_DOCUMENT),
    close: () => {
      if (db.open) {
        db.close();
      }
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
