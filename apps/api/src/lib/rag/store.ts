/**
 * File-backed grounding store: seeded platform/tone guidelines plus per-user
 * accepted rewrites. One NDJSON table under the data dir.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { normalizePlatform, type GroundingDocument, type GroundingQuery, type GroundingStore } from '@vibes/core';
import { readNdjson, tablePath, withTableLock, writeNdjsonAtomic } from '../db/fileStore';
import seedData from './guidelines.json';

const TABLE_NAME = 'grounding_docs';
const GENERIC_PLATFORM = 'generic';
const PLATFORM_MATCH_BONUS = 0.25;
const USER_EXAMPLE_BONUS = 0.25;

const SeedGuidelineSchema = z.object({
  id: z.string().min(1),
  platform: z.string().min(1),
  tone: z.string().nullable(),
  title: z.string().min(1),
  text: z.string().min(1),
});

const GroundingRecordSchema = SeedGuidelineSchema.extend({
  kind: z.enum(['guideline', 'user_example']),
  user_id: z.string().nullable(),
  created_at: z.string(),
});

export type GroundingRecord = z.infer<typeof GroundingRecordSchema>;

export type UserExampleInput = {
  userId: string;
  message: string;
  acceptedText: string;
  targetTone: string;
  platform?: string | null;
};

export type FileGroundingStore = GroundingStore & {
  seedGuidelines(): Promise<number>;
  upsertUserExample(input: UserExampleInput): Promise<string>;
  list(): Promise<GroundingRecord[]>;
};

export const DEFAULT_GUIDELINES = z.array(SeedGuidelineSchema).parse(seedData);

const STOPWORDS = new Set(['the', 'and', 'for', 'with', 'you', 'your', 'this', 'that', 'are', 'was', 'from', 'but']);

export function tokenize(text: string): Set<string> {
  const tokens = text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length >= 3 && !STOPWORDS.has(t));
  return new Set(tokens);
}

/** Share of query tokens found in the document, plus bonuses for platform and personal matches. */
export function scoreRecord(queryTokens: Set<string>, record: GroundingRecord, platform: string): number {
  const docTokens = tokenize(`${record.title} ${record.text}`);
  let overlap = 0;
  for (const token of queryTokens) {
    if (docTokens.has(token)) overlap += 1;
  }
  let score = queryTokens.size ? overlap / queryTokens.size : 0;
  if (platform !== GENERIC_PLATFORM && record.platform === platform) score += PLATFORM_MATCH_BONUS;
  if (record.kind === 'user_example') score += USER_EXAMPLE_BONUS;
  return score;
}

function isVisible(record: GroundingRecord, platform: string, userId: string | null): boolean {
  if (record.platform !== GENERIC_PLATFORM && record.platform !== platform) return false;
  if (record.kind === 'user_example') return userId !== null && record.user_id === userId;
  return true;
}

export function userExampleId(userId: string, platform: string, message: string): string {
  const digest = createHash('sha256').update(`${userId}\n${platform}\n${message}`, 'utf8').digest('hex');
  return `ex_${digest.slice(0, 16)}`;
}

export function createFileGroundingStore(options: {
  dataDir: string;
  guidelines?: readonly z.infer<typeof SeedGuidelineSchema>[];
  now?: () => Date;
}): FileGroundingStore {
  const file = tablePath(options.dataDir, TABLE_NAME);
  const guidelines = options.guidelines ?? DEFAULT_GUIDELINES;
  const now = options.now ?? (() => new Date());

  const list = () => readNdjson(file, GroundingRecordSchema);

  return {
    list,

    async retrieve(query: GroundingQuery): Promise<GroundingDocument[]> {
      const platform = normalizePlatform(query.platform) || GENERIC_PLATFORM;
      const userId = query.userId ?? null;
      const queryTokens = tokenize(query.query);
      const records = await list();
      return records
        .filter((record) => isVisible(record, platform, userId))
        .map((record, index) => ({ record, index, relevance: scoreRecord(queryTokens, record, platform) }))
        .sort((a, b) => b.relevance - a.relevance || a.index - b.index)
        .slice(0, Math.max(0, query.topK))
        .map(({ record, relevance }) => ({ title: record.title, text: record.text, relevance }));
    },

    async seedGuidelines(): Promise<number> {
      return withTableLock(file, async () => {
        const rows = await list();
        const existing = new Set(rows.map((r) => r.id));
        const createdAt = now().toISOString();
        const fresh: GroundingRecord[] = guidelines
          .filter((g) => !existing.has(g.id))
          .map((g) => ({ ...g, kind: 'guideline' as const, user_id: null, created_at: createdAt }));
        if (fresh.length) await writeNdjsonAtomic(file, [...rows, ...fresh]);
        return fresh.length;
      });
    },

    async upsertUserExample(input: UserExampleInput): Promise<string> {
      const platform = normalizePlatform(input.platform) || GENERIC_PLATFORM;
      const id = userExampleId(input.userId, platform, input.message);
      const record: GroundingRecord = {
        id,
        kind: 'user_example',
        platform,
        tone: input.targetTone,
        title: `${input.targetTone} example`,
        text: `Original: ${input.message}\nAccepted: ${input.acceptedText}`,
        user_id: input.userId,
        created_at: now().toISOString(),
      };
      await withTableLock(file, async () => {
        const rows = await list();
        await writeNdjsonAtomic(file, [...rows.filter((r) => r.id !== id), record]);
      });
      return id;
    },
  };
}
