import { randomUUID } from "node:crypto";
import { Pool } from "pg";
import { Logger } from "./logger";
import { RetryPolicy, Sleep, sleep, withRetry } from "./retry";

export type Payload = Record<string, unknown>;

export interface PointInput {
  vector: number[];
  payload: Payload;
}

export interface StoredPoint {
  id: string;
  score: number;
  payload: Payload;
}

export type FieldCondition =
  | { key: string; range: { gte?: number; lte?: number } }
  | { key: string; matchAny: string[] }
  | { key: string; matchValue: string };

/** Every condition must hold. */
export interface PayloadFilter {
  must: FieldCondition[];
}

export interface SearchOptions {
  limit: number;
  filter?: PayloadFilter;
  scoreThreshold?: number;
}

export interface VectorStore {
  ensureCollection(): Promise<void>;
  upsert(points: PointInput[]): Promise<string[]>;
  /** Similarity search; a zero vector has no direction and matches nothing. */
  search(vector: number[], options: SearchOptions): Promise<StoredPoint[]>;
  /** Filtered read, newest first, with no similarity involved. */
  findByFilter(filter: PayloadFilter, limit: number): Promise<StoredPoint[]>;
  /** Stable oldest-first pages over every matching point. */
  scrollByFilter(filter: PayloadFilter, limit: number, offset?: number): Promise<StoredPoint[]>;
  setPayload(pointIds: string[], payload: Payload): Promise<number>;
  count(): Promise<number>;
}

export interface SqlResult {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

/** The slice of a pg client this store needs. */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<SqlResult>;
}

export function poolClient(pool: Pool): SqlClient {
  return {
    async query(text, params) {
      const result = await pool.query(text, params);
      return { rows: result.rows, rowCount: result.rowCount };
    }
  };
}

export function createPool(connectionString: string, timeoutMs: number): Pool {
  return new Pool({
    connectionString,
    query_timeout: timeoutMs,
    connectionTimeoutMillis: timeoutMs
  });
}

function embeddingToVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

export function isZeroVector(vector: number[]): boolean {
  return vector.every((value) => value === 0);
}

const KEY_PATTERN = /^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)*$/i;

/** "product_data.min_price" -> '{product_data,min_price}' for the #>> operator. */
export function payloadPath(key: string): string {
  if (!KEY_PATTERN.test(key)) {
    throw new Error(`Invalid payload key: ${key}`);
  }
  return `'{${key.split(".").join(",")}}'`;
}

export function buildFilterSql(filter: PayloadFilter | undefined, params: unknown[]): string {
  if (!filter || filter.must.length === 0) {
    return "true";
  }
  const clauses: string[] = [];
  for (const condition of filter.must) {
    const field = `payload #>> ${payloadPath(condition.key)}`;
    if ("range" in condition) {
      if (condition.range.gte !== undefined) {
        params.push(condition.range.gte);
        clauses.push(`(${field})::double precision >= $${params.length}`);
      }
      if (condition.range.lte !== undefined) {
        params.push(condition.range.lte);
        clauses.push(`(${field})::double precision <= $${params.length}`);
      }
    } else if ("matchAny" in condition) {
      params.push(condition.matchAny);
      clauses.push(`${field} = any($${params.length}::text[])`);
    } else {
      params.push(condition.matchValue);
      clauses.push(`${field} = $${params.length}`);
    }
  }
  return clauses.length > 0 ? clauses.join(" and ") : "true";
}

function toPayload(value: unknown): Payload {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function toPoint(row: Record<string, unknown>): StoredPoint {
  const score = Number(row.score ?? 0);
  return {
    id: String(row.id),
    score: Number.isFinite(score) ? score : 0,
    payload: toPayload(row.payload)
  };
}

export interface PgVectorStoreOptions {
  collection: string;
  dimension: number;
  retry: RetryPolicy;
  logger: Logger;
  sleep?: Sleep;
}

/**
 * A collection is one table of (id, embedding, payload). Writes always allocate new ids;
 * duplicates are resolved by readers.
 */
export class PgVectorStore implements VectorStore {
  private readonly table: string;
  private readonly wait: Sleep;

  constructor(
    private readonly client: SqlClient,
    private readonly options: PgVectorStoreOptions
  ) {
    if (!/^[a-z_][a-z0-9_]*$/.test(options.collection)) {
      throw new Error(`Invalid collection name: ${options.collection}`);
    }
    this.table = options.collection;
    this.wait = options.sleep ?? sleep;
  }

  private run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(`vector_store.${operation}`, fn, this.options.retry, this.options.logger, this.wait);
  }

  async ensureCollection(): Promise<void> {
    await this.run("ensure_collection", async () => {
      await this.client.query("create extension if not exists vector");
      await this.client.query(
        `
        create table if not exists ${this.table} (
          id uuid primary key,
          embedding vector(${this.options.dimension}) not null,
          payload jsonb not null default '{}'::jsonb,
          created_at timestamptz not null default now()
        )
        `
      );
      await this.client.query(
        `create index if not exists ${this.table}_product_id_idx on ${this.table} ((payload #>> '{product_data,id}'))`
      );
    });
    this.options.logger.info("collection_ready", { collection: this.table, dimension: this.options.dimension });
  }

  async upsert(points: PointInput[]): Promise<string[]> {
    if (points.length === 0) {
      return [];
    }
    for (const point of points) {
      if (point.vector.length !== this.options.dimension) {
        throw new Error(`Vector has dimension ${point.vector.length}, collection expects ${this.options.dimension}`);
      }
    }

    const ids = points.map(() => randomUUID());
    const params: unknown[] = [];
    const values = points.map((point, index) => {
      params.push(ids[index], embeddingToVectorLiteral(point.vector), JSON.stringify(point.payload));
      const base = params.length - 3;
      return `($${base + 1}::uuid, $${base + 2}::vector, $${base + 3}::jsonb)`;
    });

    await this.run("upsert", () =>
      this.client.query(`insert into ${this.table} (id, embedding, payload) values ${values.join(", ")}`, params)
    );
    return ids;
  }

  async search(vector: number[], options: SearchOptions): Promise<StoredPoint[]> {
    if (isZeroVector(vector)) {
      return [];
    }

    const params: unknown[] = [embeddingToVectorLiteral(vector)];
    const where = [buildFilterSql(options.filter, params)];
    if (options.scoreThreshold !== undefined) {
      params.push(options.scoreThreshold);
      where.push(`1 - (embedding <=> $1::vector) >= $${params.length}`);
    }
    params.push(options.limit);

    const { rows } = await this.run("search", () =>
      this.client.query(
        `
        select id, payload, 1 - (embedding <=> $1::vector) as score
        from ${this.table}
        where ${where.join(" and ")}
        order by embedding <=> $1::vector
        limit $${params.length}
        `,
        params
      )
    );
    return rows.map(toPoint);
  }

  async findByFilter(filter: PayloadFilter, limit: number): Promise<StoredPoint[]> {
    const params: unknown[] = [];
    const where = buildFilterSql(filter, params);
    params.push(limit);
    const { rows } = await this.run("find", () =>
      this.client.query(
        `select id, payload, 0 as score from ${this.table} where ${where} order by created_at desc limit $${params.length}`,
        params
      )
    );
    return rows.map(toPoint);
  }

  async scrollByFilter(filter: PayloadFilter, limit: number, offset = 0): Promise<StoredPoint[]> {
    const params: unknown[] = [];
    const where = buildFilterSql(filter, params);
    params.push(limit, offset);
    const { rows } = await this.run("scroll", () =>
      this.client.query(
        `select id, payload, 0 as score from ${this.table} where ${where} order by created_at, id limit $${params.length - 1} offset $${params.length}`,
        params
      )
    );
    return rows.map(toPoint);
  }

  /** Merges `payload` into each point's payload at the top level. */
  async setPayload(pointIds: string[], payload: Payload): Promise<number> {
    if (pointIds.length === 0) {
      return 0;
    }
    const result = await this.run("set_payload", () =>
      this.client.query(`update ${this.table} set payload = payload || $1::jsonb where id = any($2::uuid[])`, [
        JSON.stringify(payload),
        pointIds
      ])
    );
    return result.rowCount ?? 0;
  }

  async count(): Promise<number> {
    const { rows } = await this.run("count", () => this.client.query(`select count(*)::int as count from ${this.table}`));
    return Number(rows[0]?.count ?? 0);
  }
}
