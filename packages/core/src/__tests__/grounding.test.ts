import { describe, expect, it } from 'vitest';
import { createGenerationOrchestrator } from '../generation/orchestrator';
import { createGroundingClient } from '../grounding/client';
import type { GroundingQuery, GroundingStore } from '../models';
import { createPlatformRulesProvider } from '../platform/rules';
import { createTraceCounters } from '../trace';
import { staticVibeTemplates } from '../vibes/templates';
import { failingStore, staticStore } from './fakes';

const docs = [
  { title: 'a', text: 'A', relevance: 0.1 },
  { title: 'b', text: 'B', relevance: 0.7 },
  { title: 'c', text: 'C', relevance: 0.4 },
];

describe('grounding client', () => {
  it('returns at most top_k documents by relevance', async () => {
    const client = createGroundingClient(staticStore(docs));
    const result = await client.retrieve({ query: 'q', topK: 2 });
    expect(result.map((doc) => doc.title)).toEqual(['b', 'c']);
  });

  it('swallows store errors', async () => {
    const counters = createTraceCounters();
    const result = await createGroundingClient(failingStore).retrieve({ query: 'q', topK: 5 }, { observer: counters });
    expect(result).toEqual([]);
    expect(counters.counts()['grounding:grounding_failure']).toBe(1);
  });

  it('gives up on a slow store', async () => {
    const slow: GroundingStore = { retrieve: () => new Promise(() => {}) };
    const result = await createGroundingClient(slow, { timeoutMs: 10 }).retrieve({ query: 'q', topK: 5 });
    expect(result).toEqual([]);
  });

  it('returns nothing without a store', async () => {
    expect(await createGroundingClient(undefined).retrieve({ query: 'q', topK: 5 })).toEqual([]);
  });

  it('hands the store a signal and stops waiting when the request is cancelled', async () => {
    const seen: { query?: GroundingQuery } = {};
    const hanging: GroundingStore = {
      retrieve: (query) => {
        seen.query = query;
        return new Promise(() => {});
      },
    };
    const controller = new AbortController();
    const counters = createTraceCounters();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    const result = await createGroundingClient(hanging, { timeoutMs: 5_000 }).retrieve(
      { query: 'q', topK: 5, signal: controller.signal },
      { observer: counters },
    );

    expect(result).toEqual([]);
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(seen.query?.signal?.aborted).toBe(true);
    expect(counters.get('grounding', 'failed')).toBe(1);
  });

  it('skips the store when the request is already cancelled', async () => {
    let calls = 0;
    const store: GroundingStore = {
      retrieve: async () => {
        calls += 1;
        return docs;
      },
    };
    const controller = new AbortController();
    controller.abort();

    expect(await createGroundingClient(store).retrieve({ query: 'q', topK: 5, signal: controller.signal })).toEqual([]);
    expect(calls).toBe(0);
  });

  it('receives the generation request signal', async () => {
    const seen: { query?: GroundingQuery } = {};
    const hanging: GroundingStore = {
      retrieve: (query) => {
        seen.query = query;
        return new Promise(() => {});
      },
    };
    const orchestrator = createGenerationOrchestrator({
      tiers: [],
      grounding: createGroundingClient(hanging, { timeoutMs: 5_000 }),
      templates: staticVibeTemplates,
      rules: createPlatformRulesProvider(),
    });
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    const result = await orchestrator.generate({ message: 'Hi', signal: controller.signal });

    expect(result.tier).toBe('local_templates');
    expect(result.grounding).toEqual([]);
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(seen.query?.signal?.aborted).toBe(true);
  });
});
