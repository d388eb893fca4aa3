import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CATEGORIES, DEFAULT_CATEGORY } from '../memory/types.js';

export const LabelledExampleSchema = z.object({
  text: z.string().min(1),
  safe: z.boolean(),
  category: z.enum(CATEGORIES).default(DEFAULT_CATEGORY),
});

export const TrainingGroundsSchema = z.array(LabelledExampleSchema);

export type LabelledExample = z.infer<typeof LabelledExampleSchema>;

// Resolves to <package>/data from both src/classifier and dist/classifier.
export const DEFAULT_TRAINING_GROUNDS = fileURLToPath(
  new URL('../../data/training-grounds.json', import.meta.url)
);

export function loadTrainingGrounds(filePath: string = DEFAULT_TRAINING_GROUNDS): LabelledExample[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(
      `Failed to read training grounds ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = TrainingGroundsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid training grounds ${filePath} at ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}
