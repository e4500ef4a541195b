import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { PipelineRecord } from '../../pipeline/pipeline.types';
import { serializeRecord } from '../../pipeline/record-serializer';
import { OutputSink } from '../interfaces/plugin.interface';
import { definePlugin, requiredString } from '../plugin-options';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Inserts each record as a JSON document into a SQLite table:
 *
 *   id INTEGER PRIMARY KEY, received_at TEXT, record TEXT
 *
 * The table is created on initialize if it does not exist.
 */
export class SqliteOutput implements OutputSink {
  private readonly logger = new Logger(SqliteOutput.name);
  private db: Database.Database | null = null;
  private insert: Database.Statement<[string, string]> | null = null;

  constructor(
    private readonly path: string,
    private readonly table: string,
  ) {}

  initialize(): void {
    const db = new Database(this.path);
    this.db = db;
    db.exec(
      `CREATE TABLE IF NOT EXISTS "${this.table}" (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        received_at TEXT NOT NULL,
        record TEXT NOT NULL
      )`,
    );
    this.insert = db.prepare<[string, string]>(
      `INSERT INTO "${this.table}" (received_at, record) VALUES (?, ?)`,
    );
    this.logger.log(`Writing records to ${this.path} table ${this.table}`);
  }

  emit(record: PipelineRecord): void {
    if (!this.insert) {
      throw new Error(`${this.path} is not open`);
    }
    this.insert.run(
      new Date().toISOString(),
      JSON.stringify(serializeRecord(record)),
    );
  }

  close(): void {
    this.insert = null;
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

export const sqliteOutputPlugin = definePlugin({
  role: 'output',
  name: 'sqlite',
  description: 'Insert records as JSON into a SQLite table',
  defaults: { table: 'records' },
  options: z
    .object({
      path: requiredString(),
      table: requiredString().regex(IDENTIFIER, 'must be a plain SQL identifier'),
    })
    .strict(),
  create: (options) => new SqliteOutput(options.path, options.table),
});
