/**
 * Dataset Module
 *
 * Purpose: read the three entity collections from a JSON file
 * Dependencies: zod, fs
 *
 * Only the top-level shape is checked here; records are validated by the
 * graph builder, which knows which field is missing.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { DatasetLoadError } from '../../errors';
import type { DatasetCollections } from '../../types/entities';

export const DatasetSchema = z.object({
  users: z.record(z.unknown()),
  posts: z.record(z.unknown()),
  comments: z.record(z.unknown()),
});

export function parseDataset(value: unknown, source = 'input'): DatasetCollections {
  const result = DatasetSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new DatasetLoadError(source, `${where}: ${issue?.message ?? 'invalid dataset'}`);
  }
  return result.data;
}

export function loadDataset(filePath: string): DatasetCollections {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new DatasetLoadError(filePath, error instanceof Error ? error.message : String(error));
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new DatasetLoadError(filePath, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  return parseDataset(value, filePath);
}
