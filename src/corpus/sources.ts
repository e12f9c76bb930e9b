/**
 * Corpus sources
 *
 * A source only produces the raw collection; validation always goes through
 * the loader so both sources accept exactly the same entries.
 */

import { readFile } from "node:fs/promises";
import postgres from "postgres";
import { getDatabaseUrl } from "../config.js";
import { errorMessage, LoadError } from "../errors.js";
import type { AppConfig } from "../types/env.js";
import type { Corpus } from "../types/corpus.js";
import { loadCorpus, parseCorpus } from "./loader.js";

export interface CorpusSource {
  describe(): string;
  load(options?: { strict?: boolean }): Promise<Corpus>;
  close?(): Promise<void>;
}

export class FileCorpusSource implements CorpusSource {
  constructor(private readonly path: string) {}

  describe(): string {
    return `file:${this.path}`;
  }

  async load(options: { strict?: boolean } = {}): Promise<Corpus> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      throw LoadError.malformed(
        `Cannot read corpus file ${this.path}: ${errorMessage(error)}`
      );
    }
    return parseCorpus(text, { ...options, source: this.describe() });
  }
}

/**
 * Row shape of the `api_endpoints` table
 */
export interface EndpointRow {
  method: string;
  path: string;
  name: string | null;
  description: string | null;
  parameters: unknown;
  example: string | null;
  tags: string[] | null;
  category: string | null;
}

export class PostgresCorpusSource implements CorpusSource {
  private sql: ReturnType<typeof postgres> | null = null;

  constructor(private readonly config: AppConfig) {}

  describe(): string {
    return `postgres:${this.config.CORPUS_DB_HOST}:${this.config.CORPUS_DB_PORT}/${this.config.CORPUS_DB_DATABASE}`;
  }

  async load(options: { strict?: boolean } = {}): Promise<Corpus> {
    let rows: readonly EndpointRow[];
    try {
      rows = await this.fetchRows();
    } catch (error) {
      throw LoadError.malformed(
        `Cannot read endpoints from ${this.describe()}: ${errorMessage(error)}`
      );
    }

    const entries = rows.map((row) => ({
      method: row.method,
      path: row.path,
      name: row.name,
      description: row.description,
      parameters: row.parameters ?? [],
      example: row.example,
      tags: row.tags ?? [],
      category: row.category,
    }));

    return loadCorpus(entries, { ...options, source: this.describe() });
  }

  protected async fetchRows(): Promise<readonly EndpointRow[]> {
    const sql = this.connection();
    return sql<EndpointRow[]>`
      SELECT method, path, name, description, parameters, example, tags, category
      FROM api_endpoints
      ORDER BY id
    `;
  }

  private connection(): ReturnType<typeof postgres> {
    if (!this.sql) {
      this.sql = postgres(getDatabaseUrl(this.config), {
        max: 2,
        idle_timeout: 20,
        connect_timeout: 10,
      });
    }
    return this.sql;
  }

  async close(): Promise<void> {
    if (this.sql) {
      await this.sql.end();
      this.sql = null;
    }
  }
}

export function createCorpusSource(config: AppConfig): CorpusSource {
  return config.CORPUS_SOURCE === "postgres"
    ? new PostgresCorpusSource(config)
    : new FileCorpusSource(config.CORPUS_PATH);
}
