import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// `PORT=` in .env arrives as '' and counts as unset.
const blankAsUnset = (value: unknown): unknown => (value === '' ? undefined : value);

const EnvSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(3000)),
  DATASET_PATH: z.preprocess(blankAsUnset, z.string().min(1).default('data/sample-dataset.json')),
  RANK_VIEWS_IMPORTANCE: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(1).default(0.5)),
  RANK_TOP_N: z.preprocess(blankAsUnset, z.coerce.number().int().default(1)),
});

export interface AppConfig {
  port: number;
  datasetPath: string;
  ranking: {
    viewsImportance: number;
    topN: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid configuration: ${issue?.path.join('.') ?? 'env'} ${issue?.message ?? ''}`.trim());
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    datasetPath: parsed.DATASET_PATH,
    ranking: {
      viewsImportance: parsed.RANK_VIEWS_IMPORTANCE,
      topN: parsed.RANK_TOP_N,
    },
  };
}

export const config = loadConfig();
