/**
 * LanceDB Vector Store Wrapper
 * Persistent chunk storage and vector search using LanceDB.
 */

import { connect, type Connection, type Table } from '@lancedb/lancedb';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { matchesFilter } from './store.js';
import type {
  Chunk,
  ChunkMetadata,
  ChunkModality,
  MetadataFilter,
  MetadataValue,
  StoreMatch,
  VectorEntry,
  VectorStore,
} from './types.js';

const VECTOR_TABLE_NAME = 'chunks';

/** Filter keys stored as their own columns and pushed down to LanceDB */
const COLUMN_FILTERS = new Set(['documentId', 'sourceName', 'modality', 'position']);

/** Over-fetch factor when part of the filter must be applied after the search */
const POST_FILTER_OVERFETCH = 4;

const CHUNK_MODALITIES: readonly ChunkModality[] = ['text', 'image', 'pdf-text', 'pdf-image'];

function sqlLiteral(value: MetadataValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Split a filter into a SQL predicate over columns and the remaining metadata keys.
 */
export function buildWhereClause(filter: MetadataFilter | undefined): { where?: string; residual: boolean } {
  if (!filter) {
    return { residual: false };
  }

  const clauses: string[] = [];
  let residual = false;

  for (const [key, value] of Object.entries(filter)) {
    if (COLUMN_FILTERS.has(key)) {
      clauses.push(value === null ? `\`${key}\` IS NULL` : `\`${key}\` = ${sqlLiteral(value)}`);
    } else {
      residual = true;
    }
  }

  return { where: clauses.length > 0 ? clauses.join(' AND ') : undefined, residual };
}

function readString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

function readNumber(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return 0;
}

function parseMetadata(raw: unknown): ChunkMetadata {
  if (typeof raw !== 'string' || raw.length === 0) {
    return {};
  }

  const parsed: unknown = JSON.parse(raw);
  const metadata: ChunkMetadata = {};
  if (parsed && typeof parsed === 'object') {
    for (const [key, value] of Object.entries(parsed)) {
      if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        metadata[key] = value;
      }
    }
  }
  return metadata;
}

function toModality(value: string): ChunkModality {
  return CHUNK_MODALITIES.find((modality) => modality === value) ?? 'text';
}

function rowToChunk(row: Record<string, unknown>): Chunk {
  return {
    id: readString(row, 'id'),
    documentId: readString(row, 'documentId'),
    sourceName: readString(row, 'sourceName'),
    modality: toModality(readString(row, 'modality')),
    position: readNumber(row, 'position'),
    text: readString(row, 'text'),
    span: { start: readNumber(row, 'spanStart'), end: readNumber(row, 'spanEnd') },
    metadata: parseMetadata(row.metadata),
  };
}

/**
 * LanceDB store. One table holds every chunk, with its metadata as JSON.
 */
export class LanceStore implements VectorStore {
  private dbPath: string;
  private connection: Connection | null = null;
  private table: Table | null = null;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  /**
   * Initialize the LanceDB connection and table.
   */
  async init(): Promise<void> {
    const dir = dirname(this.dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    this.connection = await connect(this.dbPath);

    const tableNames = await this.connection.tableNames();
    if (tableNames.includes(VECTOR_TABLE_NAME)) {
      this.table = await this.connection.openTable(VECTOR_TABLE_NAME);
    }
    // Table will be created on first insert if it doesn't exist
  }

  async put(entries: VectorEntry[]): Promise<string[]> {
    if (entries.length === 0) return [];

    if (!this.connection) {
      throw new Error('LanceStore not initialized. Call init() first.');
    }

    const data = entries.map(({ chunk, embedding }) => ({
      id: chunk.id,
      documentId: chunk.documentId,
      sourceName: chunk.sourceName,
      modality: chunk.modality,
      position: chunk.position,
      text: chunk.text,
      spanStart: chunk.span.start,
      spanEnd: chunk.span.end,
      metadata: JSON.stringify(chunk.metadata),
      vector: embedding,
    }));

    if (!this.table) {
      this.table = await this.connection.createTable(VECTOR_TABLE_NAME, data);
    } else {
      // upsert so a re-ingested document overwrites its chunks in one commit
      await this.table.mergeInsert('id').whenMatchedUpdateAll().whenNotMatchedInsertAll().execute(data);
    }

    return entries.map((entry) => entry.chunk.id);
  }

  async query(embedding: number[], k: number, filter?: MetadataFilter): Promise<StoreMatch[]> {
    if (!this.table) {
      return [];
    }

    const { where, residual } = buildWhereClause(filter);
    let query = this.table
      .vectorSearch(embedding)
      .distanceType('cosine')
      .limit(residual ? k * POST_FILTER_OVERFETCH : k);
    if (where) {
      query = query.where(where);
    }

    const rows: Record<string, unknown>[] = await query.toArray();

    return rows
      .map((row) => {
        // cosine distance is in [0, 2]
        const distance = readNumber(row, '_distance');
        return { chunk: rowToChunk(row), score: Math.min(1, Math.max(0, 1 - distance / 2)) };
      })
      .filter((match) => !residual || matchesFilter(match.chunk, filter))
      .slice(0, k);
  }

  async scan(filter: MetadataFilter | undefined, limit: number): Promise<Chunk[]> {
    if (!this.table) {
      return [];
    }

    const { where, residual } = buildWhereClause(filter);
    let query = this.table.query().limit(residual ? limit * POST_FILTER_OVERFETCH : limit);
    if (where) {
      query = query.where(where);
    }

    const rows: Record<string, unknown>[] = await query.toArray();
    return rows
      .map(rowToChunk)
      .filter((chunk) => !residual || matchesFilter(chunk, filter))
      .slice(0, limit);
  }

  async deleteDocument(documentId: string): Promise<number> {
    if (!this.table) {
      return 0;
    }

    const predicate = `\`documentId\` = ${sqlLiteral(documentId)}`;
    const removed = await this.table.countRows(predicate);
    await this.table.delete(predicate);
    return removed;
  }

  async documentChunkIds(documentId: string): Promise<string[]> {
    if (!this.table) {
      return [];
    }

    const rows: Record<string, unknown>[] = await this.table
      .query()
      .where(`\`documentId\` = ${sqlLiteral(documentId)}`)
      .select(['id'])
      .toArray();
    return rows.map((row) => readString(row, 'id'));
  }

  async deleteChunks(ids: string[]): Promise<number> {
    if (!this.table || ids.length === 0) {
      return 0;
    }

    const predicate = `\`id\` IN (${ids.map((id) => sqlLiteral(id)).join(', ')})`;
    const removed = await this.table.countRows(predicate);
    await this.table.delete(predicate);
    return removed;
  }

  async count(): Promise<number> {
    if (!this.table) {
      return 0;
    }
    return this.table.countRows();
  }

  async documentCount(): Promise<number> {
    if (!this.table) {
      return 0;
    }

    const rows: Record<string, unknown>[] = await this.table.query().select(['documentId']).toArray();
    return new Set(rows.map((row) => readString(row, 'documentId'))).size;
  }

  /**
   * Close the database connection.
   */
  async close(): Promise<void> {
    this.connection = null;
    this.table = null;
  }
}

/**
 * Create and initialize a LanceStore.
 */
export async function createLanceStore(dbPath: string): Promise<LanceStore> {
  const store = new LanceStore(dbPath);
  await store.init();
  return store;
}
