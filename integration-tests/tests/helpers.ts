/**
 * Test Helpers
 *
 * Temp directories, fixture texts and predictor fakes shared by the suites.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';

/** Fully labelled journey text */
export const LABELLED_TEXT =
  'JourneyId: 2002\nScore: -4.2\nReason: late arrival\nSolution: reroute via north line';

/** Prose with keywords only */
export const UNLABELLED_TEXT =
  'the journey was a disaster, score was roughly minus two, reason seems to be weather';

/** Reply a well-behaved model gives for UNLABELLED_TEXT */
export const MODEL_REPLY =
  '{"journey_id":null,"score":"-2","reason":"weather","solution":"delay notice"}';

/**
 * Create a temp directory and return its path.
 */
export async function makeTempDir(prefix = 'journeys-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Read a JSONL file into parsed values.
 */
export async function readJsonLines(filePath: string): Promise<unknown[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return content
    .split('\n')
    .filter((line) => line.trim() !== '')
    .map((line): unknown => JSON.parse(line));
}
