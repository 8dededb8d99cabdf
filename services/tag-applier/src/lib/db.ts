/**
 * Database Operations
 *
 * Applies cause tags to journeys. Every CSV row runs in its own transaction.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  tagRowsCounter,
} from '@journey-extractor/shared';
import { normalizeDepartureDate, uniqueCauses, type TagRow } from './rows';

const INSERT_TAG_SQL = 'INSERT INTO ana_tag(code, version) VALUES ($1, $2) ON CONFLICT DO NOTHING';

const LINK_JOURNEY_SQL = `INSERT INTO ana_tag_journey_elt(code, journey_id)
SELECT $1, id FROM net_journey WHERE (num, dep_date) IN (($2, $3)) ON CONFLICT DO NOTHING`;

const CLEAR_LINKS_SQL = 'DELETE FROM ana_tag_journey_elt WHERE code = ANY($1)';

/**
 * The subset of a pg client used here
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>;
}

export interface TagClient extends Queryable {
  release(): void;
}

export interface TagPool {
  connect(): Promise<TagClient>;
}

export interface TagSummary {
  processed: number;
  failed: number;
  linked: number;
}

export class TagRowError extends Error {
  constructor(message: string, readonly position: number) {
    super(message);
    this.name = 'TagRowError';
  }
}

export function createPool(connectionString: string = config.databaseUrl): Pool {
  return new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30000,
  });
}

/**
 * Run `fn` inside BEGIN/COMMIT on a pooled client, rolling back on error.
 */
async function withTransaction<T>(
  pool: TagPool,
  operation: string,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  const startTime = Date.now();

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');

    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Remove existing journey links for the given causes before re-applying them.
 */
export async function clearTagLinks(pool: TagPool, causes: string[]): Promise<number> {
  if (causes.length === 0) {
    return 0;
  }

  const deleted = await withTransaction(pool, 'clear_tag_links', async (client) => {
    const result = await client.query(CLEAR_LINKS_SQL, [causes]);
    return result.rowCount ?? 0;
  });

  logger.info('Cleared existing journey links', { causes: causes.length, deleted });
  return deleted;
}

/**
 * Apply one row: upsert the tag, then link it to matching journeys.
 *
 * @returns number of journeys linked
 * @throws TagRowError when the row has no cause or an unparseable date
 */
export async function applyTagRow(pool: TagPool, row: TagRow, version: number): Promise<number> {
  if (!row.cause) {
    throw new TagRowError('CAUSE is required', row.position);
  }

  const depDate = normalizeDepartureDate(row.depDate);
  if (!depDate) {
    throw new TagRowError(`Invalid DEP_DATE: "${row.depDate}"`, row.position);
  }

  return withTransaction(pool, 'apply_tag_row', async (client) => {
    await client.query(INSERT_TAG_SQL, [row.cause, version]);
    const result = await client.query(LINK_JOURNEY_SQL, [row.cause, row.journeyNum, depDate]);
    return result.rowCount ?? 0;
  });
}

/**
 * Apply all rows. Failed rows are logged and counted; processing continues.
 */
export async function applyTagRows(
  pool: TagPool,
  rows: TagRow[],
  version: number = config.tagVersion
): Promise<TagSummary> {
  const summary: TagSummary = { processed: 0, failed: 0, linked: 0 };

  await clearTagLinks(pool, uniqueCauses(rows));

  for (const row of rows) {
    try {
      const linked = await applyTagRow(pool, row, version);
      summary.processed++;
      summary.linked += linked;
      tagRowsCounter.inc({ status: 'success' });

      logger.debug('Applied tag row', {
        position: row.position,
        cause: row.cause,
        journey_num: row.journeyNum,
        linked,
      });
    } catch (error) {
      summary.failed++;
      tagRowsCounter.inc({ status: 'error' });
      logger.error('Failed to apply tag row', error, {
        position: row.position,
        cause: row.cause,
        journey_num: row.journeyNum,
        dep_date: row.depDate,
      });
    }
  }

  return summary;
}
