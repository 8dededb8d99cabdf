/**
 * JSONL journey store
 *
 * Reads the batch extractor's output. The file is re-read on every call so
 * fresh batch runs are visible without a restart.
 */

import fs from 'fs/promises';
import { logger, validateExtractedEntry, type ExtractedEntry } from '@journey-extractor/shared';

export class JourneyStoreNotFoundError extends Error {
  constructor(readonly filePath: string) {
    super(`Journey output not found: ${filePath}`);
    this.name = 'JourneyStoreNotFoundError';
  }
}

function isExtractedEntry(value: unknown): value is ExtractedEntry {
  return validateExtractedEntry(value).valid;
}

// fs errors may come from another realm's Error, so match on shape
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse JSONL content. Blank lines are ignored; malformed or schema-invalid
 * lines are skipped with a warning.
 */
export function parseJourneyLines(content: string): ExtractedEntry[] {
  const entries: ExtractedEntry[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      logger.warn('Skipping malformed journey line', {
        line: index + 1,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    if (!isExtractedEntry(parsed)) {
      logger.warn('Skipping journey line that does not match contract', {
        line: index + 1,
        errors: validateExtractedEntry(parsed).errors,
      });
      return;
    }

    entries.push(parsed);
  });

  return entries;
}

/**
 * @throws JourneyStoreNotFoundError when the file does not exist
 */
export async function readJourneyEntries(filePath: string): Promise<ExtractedEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new JourneyStoreNotFoundError(filePath);
    }
    throw error;
  }
  return parseJourneyLines(content);
}
