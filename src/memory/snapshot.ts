import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CATEGORIES, type Category, type MemorySnapshot } from './types.js';

const ScoreSchema = z.number().finite();

const ScoreMapSchema = z.record(z.string(), ScoreSchema).default({});

export const MemorySnapshotSchema = z.object({
  words: ScoreMapSchema,
  phrases: ScoreMapSchema,
  game_ideas: ScoreMapSchema,
});

export type SnapshotLoadResult =
  | { status: 'missing'; path: string }
  | { status: 'loaded'; path: string; snapshot: MemorySnapshot }
  | { status: 'corrupt'; path: string; reason: string };

// Own keys of raw[category]. zod's record parser skips "__proto__".
function rawEntries(raw: unknown, category: Category): [string, unknown][] {
  if (typeof raw !== 'object' || raw === null) {
    return [];
  }
  const scores: unknown = Reflect.get(raw, category);
  return typeof scores === 'object' && scores !== null ? Object.entries(scores) : [];
}

export function readSnapshot(filePath: string): SnapshotLoadResult {
  if (!fs.existsSync(filePath)) {
    return { status: 'missing', path: filePath };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    return {
      status: 'corrupt',
      path: filePath,
      reason: err instanceof Error ? err.message : String(err),
    };
  }

  const parsed = MemorySnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return { status: 'corrupt', path: filePath, reason: `${where}: ${issue.message}` };
  }

  const snapshot: MemorySnapshot = { words: {}, phrases: {}, game_ideas: {} };
  for (const category of CATEGORIES) {
    const scores: [string, number][] = [];
    for (const [text, value] of rawEntries(raw, category)) {
      const score = ScoreSchema.safeParse(value);
      if (!score.success) {
        const reason = `${category}.${text}: ${score.error.issues[0].message}`;
        return { status: 'corrupt', path: filePath, reason };
      }
      scores.push([text, score.data]);
    }
    snapshot[category] = Object.fromEntries(scores);
  }

  return { status: 'loaded', path: filePath, snapshot };
}

export function writeSnapshot(filePath: string, snapshot: MemorySnapshot): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2));
}
