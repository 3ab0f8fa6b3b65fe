import { randomUUID } from 'node:crypto';
import { type PoolClient } from 'pg';
import { type OutboxEventInput, type OutboxPort } from '@murmur/domain';

export interface OutboxEvent {
  id: string;
  aggregateType: string;
  aggregateId: string;
  eventType: string;
  payload: Record<string, unknown>;
  createdAt: Date;
  publishedAt: Date | null;
  retryCount: number;
  lastError: string | null;
}

interface OutboxRow {
  id: string;
  aggregate_type: string;
  aggregate_id: string;
  event_type: string;
  payload: Record<string, unknown>;
  created_at: Date;
  published_at: Date | null;
  retry_count: number;
  last_error: string | null;
}

export async function appendOutboxEvent(client: PoolClient, id: string, event: OutboxEventInput): Promise<void> {
  await client.query(
    `INSERT INTO outbox_events (id, aggregate_type, aggregate_id, event_type, payload)
     VALUES ($1, $2, $3, $4, $5)`,
    [id, event.aggregateType, event.aggregateId, event.eventType, JSON.stringify(event.payload)],
  );
}

/** Rows stay locked until the surrounding transaction ends, so workers never share a batch. */
export async function fetchUnpublishedEvents(
  client: PoolClient,
  batchSize: number,
  maxAttempts: number,
): Promise<OutboxEvent[]> {
  const result = await client.query<OutboxRow>(
    `SELECT id, aggregate_type, aggregate_id, event_type, payload,
            created_at, published_at, retry_count, last_error
     FROM outbox_events
     WHERE published_at IS NULL AND retry_count < $2
     ORDER BY created_at ASC
     LIMIT $1
     FOR UPDATE SKIP LOCKED`,
    [batchSize, maxAttempts],
  );
  return result.rows.map(mapRow);
}

export async function markPublished(client: PoolClient, ids: string[]): Promise<void> {
  if (ids.length === 0) return;
  await client.query(`UPDATE outbox_events SET published_at = NOW() WHERE id = ANY($1::uuid[])`, [ids]);
}

export async function markFailed(client: PoolClient, id: string, error: string): Promise<void> {
  await client.query(
    `UPDATE outbox_events SET retry_count = retry_count + 1, last_error = $2 WHERE id = $1`,
    [id, error],
  );
}

export async function deletePublishedBefore(client: PoolClient, cutoff: Date): Promise<number> {
  const result = await client.query(
    `DELETE FROM outbox_events WHERE published_at IS NOT NULL AND published_at < $1`,
    [cutoff],
  );
  return result.rowCount ?? 0;
}

/** Rows that used up their attempts are never fetched again; drop them once they are old enough. */
export async function deleteExhaustedBefore(client: PoolClient, maxAttempts: number, cutoff: Date): Promise<number> {
  const result = await client.query(
    `DELETE FROM outbox_events
     WHERE published_at IS NULL AND retry_count >= $1 AND created_at < $2`,
    [maxAttempts, cutoff],
  );
  return result.rowCount ?? 0;
}

/** The domain's view of the outbox: append only, ids generated here. */
export class PgOutbox implements OutboxPort<PoolClient> {
  constructor(private readonly generateId: () => string = randomUUID) {}

  async append(tx: PoolClient, event: OutboxEventInput): Promise<string> {
    const id = this.generateId();
    await appendOutboxEvent(tx, id, event);
    return id;
  }
}

function mapRow(row: OutboxRow): OutboxEvent {
  return {
    id: row.id,
    aggregateType: row.aggregate_type,
    aggregateId: row.aggregate_id,
    eventType: row.event_type,
    payload: row.payload,
    createdAt: row.created_at,
    publishedAt: row.published_at,
    retryCount: row.retry_count,
    lastError: row.last_error,
  };
}
