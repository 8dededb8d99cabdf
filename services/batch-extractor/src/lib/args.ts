/**
 * Command-line arguments for the batch extractor.
 */

import { parseArgs } from 'node:util';
import { config } from '@journey-extractor/shared';

export const USAGE =
  'Usage: batch-extractor <input.csv> [output.jsonl] [--text-column <name>] [--llm] [--append]';

export interface BatchOptions {
  inputPath: string;
  outputPath: string;
  /** Column holding the free text; all columns are joined when unset */
  textColumn?: string;
  /** Refine low-confidence rows with the OpenAI predictor */
  useLlm: boolean;
  /** Append to the output file instead of overwriting it */
  append: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'text-column': { type: 'string' },
        llm: { type: 'boolean', default: false },
        append: { type: 'boolean', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse CLI arguments (without the node binary and script path).
 *
 * @throws UsageError on unknown options or a missing input path
 */
export function parseBatchArgs(argv: string[]): BatchOptions {
  const parsed = readArgs(argv);
  const { values, positionals } = parsed;
  const [inputPath, outputPath, ...extra] = positionals;

  if (!inputPath) {
    throw new UsageError('Missing input CSV path');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const textColumn = values['text-column'] || config.defaultTextColumn;

  return {
    inputPath,
    outputPath: outputPath || config.outputPath,
    ...(textColumn ? { textColumn } : {}),
    useLlm: values.llm === true || config.llmRefinementEnabled,
    append: values.append === true,
  };
}
