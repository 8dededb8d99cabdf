/**
 * Batch Extractor
 *
 * Reads journey rows from a CSV file, extracts each one and writes
 * {"source_id", "extracted"} JSON lines.
 */

import fs from 'fs/promises';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContextAsync,
  parseCsv,
  createOpenAiPredictor,
  type AsyncPredictor,
} from '@journey-extractor/shared';
import { parseBatchArgs, UsageError, USAGE, type BatchOptions } from './lib/args';
import { processRows, writeEntries } from './lib/batch';

function resolvePredictor(options: BatchOptions): AsyncPredictor | undefined {
  if (!options.useLlm) {
    return undefined;
  }
  if (!config.openaiApiKey) {
    logger.warn('LLM refinement requested but OPENAI_API_KEY is not set, continuing without it');
    return undefined;
  }
  return createOpenAiPredictor();
}

export async function runBatch(options: BatchOptions): Promise<void> {
  const startTime = Date.now();
  const content = await fs.readFile(options.inputPath, 'utf-8');
  const { headers, rows } = parseCsv(content);

  if (options.textColumn && !headers.includes(options.textColumn)) {
    logger.warn('Text column not found, joining all columns', {
      text_column: options.textColumn,
      headers,
    });
  }

  logger.info('Batch extraction started', {
    input: options.inputPath,
    output: options.outputPath,
    rows: rows.length,
    llm: options.useLlm,
  });

  const { entries, summary } = await processRows(rows, {
    textColumn: options.textColumn,
    predict: resolvePredictor(options),
  });

  await writeEntries(options.outputPath, entries, options.append);

  logger.info('Batch extraction complete', {
    output: options.outputPath,
    processed: summary.processed,
    failed: summary.failed,
    by_confidence: summary.byConfidence,
    duration_ms: Date.now() - startTime,
  });
}

async function main(): Promise<void> {
  let options: BatchOptions;
  try {
    options = parseBatchArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n${USAGE}`);
      process.exit(2);
    }
    throw error;
  }

  await runWithContextAsync({ correlationId: ulid(), batchId: ulid() }, () => runBatch(options));
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Batch extraction failed', error);
    process.exit(1);
  });
}
