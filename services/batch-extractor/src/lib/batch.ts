/**
 * Batch Extraction
 *
 * Turns CSV rows into extracted journey entries and writes them as JSON lines.
 */

import fs from 'fs/promises';
import path from 'path';
import {
  logger,
  runForSourceRow,
  batchRowsCounter,
  extractJourneyRecordAsync,
  serializeRecord,
  validateExtractedEntry,
  type AsyncPredictor,
  type CsvRow,
  type ExtractedEntry,
} from '@journey-extractor/shared';

export interface ProcessRowsOptions {
  textColumn?: string;
  predict?: AsyncPredictor;
}

export interface BatchSummary {
  processed: number;
  failed: number;
  byConfidence: Record<string, number>;
}

/**
 * Text to extract from: the named column when the row has it, otherwise every
 * non-empty value joined with spaces.
 */
export function rowText(row: CsvRow, textColumn?: string): string {
  if (textColumn && Object.prototype.hasOwnProperty.call(row, textColumn)) {
    return row[textColumn] ?? '';
  }
  return Object.values(row)
    .filter((value) => value !== '')
    .join(' ');
}

/**
 * The row's `id`, else its `journey_id`, else null.
 */
export function rowSourceId(row: CsvRow): string | null {
  for (const key of ['id', 'journey_id']) {
    const value = row[key]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

/**
 * Serialize an entry as one JSON line, record keys in canonical order.
 */
export function toJsonLine(entry: ExtractedEntry): string {
  return `{"source_id":${JSON.stringify(entry.source_id)},"extracted":${serializeRecord(entry.extracted)}}`;
}

/**
 * Extract every row in order. Rows that throw are logged and counted, not
 * written.
 */
export async function processRows(
  rows: CsvRow[],
  options: ProcessRowsOptions = {}
): Promise<{ entries: ExtractedEntry[]; summary: BatchSummary }> {
  const entries: ExtractedEntry[] = [];
  const summary: BatchSummary = { processed: 0, failed: 0, byConfidence: {} };

  for (const [index, row] of rows.entries()) {
    const sourceId = rowSourceId(row);

    await runForSourceRow(sourceId, async () => {
      try {
        const extracted = await extractJourneyRecordAsync(
          rowText(row, options.textColumn),
          options.predict
        );
        const entry: ExtractedEntry = { source_id: sourceId, extracted };

        const validation = validateExtractedEntry(entry);
        if (!validation.valid) {
          logger.warn('Extracted entry does not match contract', {
            row: index + 1,
            errors: validation.errors,
          });
        }

        entries.push(entry);
        summary.processed++;
        summary.byConfidence[extracted.confidence] =
          (summary.byConfidence[extracted.confidence] || 0) + 1;
        batchRowsCounter.inc({ status: 'success' });
      } catch (error) {
        summary.failed++;
        batchRowsCounter.inc({ status: 'error' });
        logger.error('Row extraction failed', error, { row: index + 1 });
      }
    });
  }

  return { entries, summary };
}

/**
 * Write entries as JSON lines, creating the output directory when missing.
 */
export async function writeEntries(
  outputPath: string,
  entries: ExtractedEntry[],
  append = false
): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  const content = entries.map((entry) => toJsonLine(entry) + '\n').join('');
  if (append) {
    await fs.appendFile(outputPath, content, 'utf-8');
  } else {
    await fs.writeFile(outputPath, content, 'utf-8');
  }
}
