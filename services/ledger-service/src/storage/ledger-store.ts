import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { ZERO_HASH_HEX, type EventStream, type Product, type TrackingEvent } from "@provenance/shared";

export const IN_MEMORY_DB_PATH = ":memory:";

export interface VersionedProduct {
  product: Product;
  version: number;
}

export interface EventHead {
  nextSequence: number;
  headHash: string;
}

export interface StoredEventType {
  tag: string;
  label: string;
  registeredAt: string;
}

export interface EventFilterParams {
  productId: string;
  stream: EventStream;
  eventType: string | null;
  location: string | null;
  since: string | null;
  until: string | null;
}

export interface EventPageParams extends EventFilterParams {
  offset: number;
  limit: number;
}

/**
 * Durable key-value view of the ledger. Keys are composite:
 * `(product)`, `(event head, product, stream)`,
 * `(event, product, stream, sequence)`, `(event type, tag)` and
 * `(request nonce, digest)`. Reads of absent keys return `null`. Conditional
 * writes return `false` instead of overwriting when their precondition fails.
 */
export interface LedgerStore {
  transaction<T>(fn: () => T): T;
  getProduct(productId: string): VersionedProduct | null;
  insertProduct(product: Product): boolean;
  updateProduct(product: Product, expectedVersion: number): boolean;
  getEventHead(productId: string, stream: EventStream): EventHead | null;
  initEventHead(productId: string, stream: EventStream): boolean;
  advanceEventHead(productId: string, stream: EventStream, expectedNext: number, head: EventHead): boolean;
  insertEvent(event: TrackingEvent): boolean;
  getEvent(productId: string, stream: EventStream, sequence: number): TrackingEvent | null;
  listEvents(productId: string, stream: EventStream, fromSequence: number, toSequence: number): TrackingEvent[];
  queryEvents(params: EventPageParams): TrackingEvent[];
  countEvents(params: EventFilterParams): number;
  putEventType(eventType: StoredEventType): void;
  getEventType(tag: string): StoredEventType | null;
  listEventTypes(): StoredEventType[];
  /** Records a signed request digest; `false` when it was already used. */
  consumeRequestNonce(digest: string, signedAt: string): boolean;
  pruneRequestNonces(signedBefore: string): number;
  close(): void;
}

interface ProductRow {
  version: number;
  product_json: string;
}

interface EventHeadRow {
  next_sequence: number;
  head_hash: string;
}

interface EventRow {
  event_json: string;
}

interface CountRow {
  count: number;
}

interface EventTypeRow {
  tag: string;
  label: string;
  registered_at: string;
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;
  private readonly getProductStmt: Database.Statement<[string], ProductRow>;
  private readonly insertProductStmt: Database.Statement<[string, string, string]>;
  private readonly updateProductStmt: Database.Statement<[string, string, number]>;
  private readonly getHeadStmt: Database.Statement<[string, string], EventHeadRow>;
  private readonly initHeadStmt: Database.Statement<[string, string, string]>;
  private readonly advanceHeadStmt: Database.Statement<[number, string, string, string, number]>;
  private readonly insertEventStmt: Database.Statement<[string, string, number, string, string, string, string]>;
  private readonly getEventStmt: Database.Statement<[string, string, number], EventRow>;
  private readonly listEventsStmt: Database.Statement<[string, string, number, number], EventRow>;
  private readonly queryEventsStmt: Database.Statement<[EventPageParams], EventRow>;
  private readonly countEventsStmt: Database.Statement<[EventFilterParams], CountRow>;
  private readonly putEventTypeStmt: Database.Statement<[string, string, string]>;
  private readonly getEventTypeStmt: Database.Statement<[string], EventTypeRow>;
  private readonly listEventTypesStmt: Database.Statement<[], EventTypeRow>;
  private readonly insertNonceStmt: Database.Statement<[string, string]>;
  private readonly pruneNoncesStmt: Database.Statement<[string]>;

  constructor(dbPath: string) {
    if (dbPath !== IN_MEMORY_DB_PATH) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY_DB_PATH) {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS products (
        product_id TEXT PRIMARY KEY,
        version INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        product_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS event_heads (
        product_id TEXT NOT NULL,
        stream TEXT NOT NULL,
        next_sequence INTEGER NOT NULL,
        head_hash TEXT NOT NULL,
        PRIMARY KEY (product_id, stream)
      );

      CREATE TABLE IF NOT EXISTS tracking_events (
        product_id TEXT NOT NULL,
        stream TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        event_type TEXT NOT NULL,
        location TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        event_json TEXT NOT NULL,
        PRIMARY KEY (product_id, stream, sequence)
      );
      CREATE INDEX IF NOT EXISTS idx_tracking_events_type
      ON tracking_events(product_id, stream, event_type, sequence);
      CREATE INDEX IF NOT EXISTS idx_tracking_events_time
      ON tracking_events(product_id, stream, timestamp);

      CREATE TRIGGER IF NOT EXISTS tracking_events_no_update
      BEFORE UPDATE ON tracking_events
      BEGIN
        SELECT RAISE(ABORT, 'tracking_events_append_only');
      END;
      CREATE TRIGGER IF NOT EXISTS tracking_events_no_delete
      BEFORE DELETE ON tracking_events
      BEGIN
        SELECT RAISE(ABORT, 'tracking_events_append_only');
      END;

      CREATE TABLE IF NOT EXISTS event_types (
        tag TEXT PRIMARY KEY,
        label TEXT NOT NULL,
        registered_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS request_nonces (
        digest TEXT PRIMARY KEY,
        signed_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_request_nonces_signed_at
      ON request_nonces(signed_at);
    `);

    this.getProductStmt = this.db.prepare<[string], ProductRow>(`
      SELECT version, product_json
      FROM products
      WHERE product_id = ?
      LIMIT 1
    `);

    this.insertProductStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO products (product_id, version, created_at, product_json)
      VALUES (?, 1, ?, ?)
      ON CONFLICT(product_id) DO NOTHING
    `);

    this.updateProductStmt = this.db.prepare<[string, string, number]>(`
      UPDATE products
      SET version = version + 1,
          product_json = ?
      WHERE product_id = ? AND version = ?
    `);

    this.getHeadStmt = this.db.prepare<[string, string], EventHeadRow>(`
      SELECT next_sequence, head_hash
      FROM event_heads
      WHERE product_id = ? AND stream = ?
      LIMIT 1
    `);

    this.initHeadStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO event_heads (product_id, stream, next_sequence, head_hash)
      VALUES (?, ?, 0, ?)
      ON CONFLICT(product_id, stream) DO NOTHING
    `);

    this.advanceHeadStmt = this.db.prepare<[number, string, string, string, number]>(`
      UPDATE event_heads
      SET next_sequence = ?,
          head_hash = ?
      WHERE product_id = ? AND stream = ? AND next_sequence = ?
    `);

    this.insertEventStmt = this.db.prepare<[string, string, number, string, string, string, string]>(`
      INSERT INTO tracking_events (product_id, stream, sequence, event_type, location, timestamp, event_json)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(product_id, stream, sequence) DO NOTHING
    `);

    this.getEventStmt = this.db.prepare<[string, string, number], EventRow>(`
      SELECT event_json
      FROM tracking_events
      WHERE product_id = ? AND stream = ? AND sequence = ?
      LIMIT 1
    `);

    this.listEventsStmt = this.db.prepare<[string, string, number, number], EventRow>(`
      SELECT event_json
      FROM tracking_events
      WHERE product_id = ? AND stream = ? AND sequence >= ? AND sequence < ?
      ORDER BY sequence ASC
    `);

    this.queryEventsStmt = this.db.prepare<[EventPageParams], EventRow>(`
      SELECT event_json
      FROM tracking_events
      WHERE product_id = @productId
        AND stream = @stream
        AND (@eventType IS NULL OR event_type = @eventType)
        AND (@location IS NULL OR location = @location)
        AND (@since IS NULL OR timestamp >= @since)
        AND (@until IS NULL OR timestamp <= @until)
      ORDER BY sequence ASC
      LIMIT @limit OFFSET @offset
    `);

    this.countEventsStmt = this.db.prepare<[EventFilterParams], CountRow>(`
      SELECT COUNT(*) AS count
      FROM tracking_events
      WHERE product_id = @productId
        AND stream = @stream
        AND (@eventType IS NULL OR event_type = @eventType)
        AND (@location IS NULL OR location = @location)
        AND (@since IS NULL OR timestamp >= @since)
        AND (@until IS NULL OR timestamp <= @until)
    `);

    this.putEventTypeStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO event_types (tag, label, registered_at)
      VALUES (?, ?, ?)
      ON CONFLICT(tag) DO UPDATE SET
        label = excluded.label
    `);

    this.getEventTypeStmt = this.db.prepare<[string], EventTypeRow>(`
      SELECT tag, label, registered_at
      FROM event_types
      WHERE tag = ?
      LIMIT 1
    `);

    this.listEventTypesStmt = this.db.prepare<[], EventTypeRow>(`
      SELECT tag, label, registered_at
      FROM event_types
      ORDER BY tag ASC
    `);

    this.insertNonceStmt = this.db.prepare<[string, string]>(`
      INSERT INTO request_nonces (digest, signed_at)
      VALUES (?, ?)
      ON CONFLICT(digest) DO NOTHING
    `);

    this.pruneNoncesStmt = this.db.prepare<[string]>(`
      DELETE FROM request_nonces
      WHERE signed_at < ?
    `);
  }

  /** Runs `fn` in a `BEGIN IMMEDIATE` transaction; a throw rolls it back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  getProduct(productId: string): VersionedProduct | null {
    const row = this.getProductStmt.get(productId);
    if (!row) return null;
    return { product: JSON.parse(row.product_json) as Product, version: row.version };
  }

  insertProduct(product: Product): boolean {
    const result = this.insertProductStmt.run(product.id, product.createdAt, JSON.stringify(product));
    return result.changes === 1;
  }

  updateProduct(product: Product, expectedVersion: number): boolean {
    const result = this.updateProductStmt.run(JSON.stringify(product), product.id, expectedVersion);
    return result.changes === 1;
  }

  getEventHead(productId: string, stream: EventStream): EventHead | null {
    const row = this.getHeadStmt.get(productId, stream);
    if (!row) return null;
    return { nextSequence: row.next_sequence, headHash: row.head_hash };
  }

  initEventHead(productId: string, stream: EventStream): boolean {
    return this.initHeadStmt.run(productId, stream, ZERO_HASH_HEX).changes === 1;
  }

  advanceEventHead(productId: string, stream: EventStream, expectedNext: number, head: EventHead): boolean {
    const result = this.advanceHeadStmt.run(head.nextSequence, head.headHash, productId, stream, expectedNext);
    return result.changes === 1;
  }

  insertEvent(event: TrackingEvent): boolean {
    const result = this.insertEventStmt.run(
      event.productId,
      event.stream,
      event.sequence,
      event.eventType,
      event.location,
      event.timestamp,
      JSON.stringify(event),
    );
    return result.changes === 1;
  }

  getEvent(productId: string, stream: EventStream, sequence: number): TrackingEvent | null {
    const row = this.getEventStmt.get(productId, stream, sequence);
    if (!row) return null;
    return JSON.parse(row.event_json) as TrackingEvent;
  }

  listEvents(productId: string, stream: EventStream, fromSequence: number, toSequence: number): TrackingEvent[] {
    const rows = this.listEventsStmt.all(productId, stream, fromSequence, toSequence);
    return rows.map((row) => JSON.parse(row.event_json) as TrackingEvent);
  }

  queryEvents(params: EventPageParams): TrackingEvent[] {
    const rows = this.queryEventsStmt.all(params);
    return rows.map((row) => JSON.parse(row.event_json) as TrackingEvent);
  }

  countEvents(params: EventFilterParams): number {
    const row = this.countEventsStmt.get(params);
    return row ? row.count : 0;
  }

  putEventType(eventType: StoredEventType): void {
    this.putEventTypeStmt.run(eventType.tag, eventType.label, eventType.registeredAt);
  }

  getEventType(tag: string): StoredEventType | null {
    const row = this.getEventTypeStmt.get(tag);
    if (!row) return null;
    return { tag: row.tag, label: row.label, registeredAt: row.registered_at };
  }

  listEventTypes(): StoredEventType[] {
    return this.listEventTypesStmt.all().map((row) => ({
      tag: row.tag,
      label: row.label,
      registeredAt: row.registered_at,
    }));
  }

  consumeRequestNonce(digest: string, signedAt: string): boolean {
    return this.insertNonceStmt.run(digest, signedAt).changes === 1;
  }

  pruneRequestNonces(signedBefore: string): number {
    return this.pruneNoncesStmt.run(signedBefore).changes;
  }

  /** Test hook: runs raw SQL against the backing database. */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  close(): void {
    this.db.close();
  }
}
