/**
 * Tag Applier
 *
 * Applies cause tags from a CAUSE,JOURNEY_NUM,DEP_DATE CSV file to journeys
 * in PostgreSQL.
 */

import fs from 'fs/promises';
import { parseArgs } from 'node:util';
import { ulid } from 'ulid';
import { logger, config, runWithContextAsync } from '@journey-extractor/shared';
import { parseTagRows } from './lib/rows';
import { applyTagRows, createPool } from './lib/db';

const USAGE = 'Usage: tag-applier <tags.csv>';

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { positionals } = parseArgs({ args: argv, allowPositionals: true });
  const [csvPath] = positionals;

  if (!csvPath) {
    console.error(USAGE);
    return 2;
  }

  let content: string;
  try {
    content = await fs.readFile(csvPath, 'utf-8');
  } catch (error) {
    logger.error('Could not read CSV file', error, { path: csvPath });
    return 2;
  }

  const { hasHeader, rows } = parseTagRows(content);
  if (rows.length === 0) {
    logger.error('No tag rows found', undefined, { path: csvPath });
    return 2;
  }

  logger.info('Read tag rows', { rows: rows.length, header: hasHeader, version: config.tagVersion });

  const pool = createPool();
  try {
    const summary = await applyTagRows(pool, rows, config.tagVersion);
    logger.info('Tagging complete', { ...summary });
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  runWithContextAsync({ correlationId: ulid(), batchId: ulid() }, () => main())
    .then((code) => process.exit(code))
    .catch((error) => {
      logger.error('Tagging failed', error);
      process.exit(1);
    });
}
