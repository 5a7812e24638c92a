import { describe, expect, it } from 'vitest';
import { createVibePipeline } from '../pipeline';
import { createTraceCounters, type TraceEvent } from '../trace';
import { VIBE_ORDER } from '../vibes/templates';
import { SHUFFLED_RECORDS, fakeService, staticStore } from './fakes';

describe('vibe pipeline', () => {
  it('always returns five canonical candidates and a ranked top list when everything is down', async () => {
    const counters = createTraceCounters();
    const pipeline = createVibePipeline({
      generation: [fakeService('openai', new Error('down')).service, fakeService('gemini', new Error('down')).service],
      observer: counters,
    });

    const result = await pipeline.rewriteTop({ message: 'Hi', platform: 'twitter', targetTone: 'Concise' });

    expect(result.generation.candidates.map((candidate) => candidate.vibe)).toEqual([...VIBE_ORDER]);
    expect(result.scorer).toBe('heuristic');
    expect(result.top.map((candidate) => [candidate.vibe, candidate.score])).toEqual([
      ['Professional', 4.5],
      ['Friendly', 4.5],
      ['Persuasive', 4.5],
    ]);
    expect(counters.get('generation.tier', 'fallback')).toBe(2);
    expect(counters.get('ranking.scorer', 'fallback')).toBe(2);
  });

  it('uses separate scoring services when given', async () => {
    const generator = fakeService('openai', JSON.stringify(SHUFFLED_RECORDS));
    const judge = fakeService('judge', '{"c1": 1, "c2": 2, "c3": 3, "c4": 4, "c5": 5}');
    const pipeline = createVibePipeline({ generation: [generator.service], scoring: [judge.service] });

    const result = await pipeline.rewriteTop({ message: 'Hello', targetTone: 'Empathetic', count: 2 });

    expect(result.generation.tier).toBe('openai');
    expect(result.scorer).toBe('judge');
    expect(result.top.map((candidate) => [candidate.vibe, candidate.score])).toEqual([
      ['Empathetic', 5],
      ['Concise', 4],
    ]);
    expect(generator.complete).toHaveBeenCalledTimes(1);
  });

  it('records a per-call trace and reads grounding from the injected store', async () => {
    const generator = fakeService('openai', JSON.stringify(SHUFFLED_RECORDS));
    const pipeline = createVibePipeline({
      generation: [generator.service],
      grounding: staticStore([{ title: 'Tip', text: 'Be brief.', relevance: 1 }]),
    });
    const trace: TraceEvent[] = [];

    const result = await pipeline.generate({ message: 'Hello', platform: 'linkedin' }, { trace });

    expect(result.grounding).toHaveLength(1);
    expect(trace.map((event) => `${event.gate}:${event.outcome}`)).toEqual(['grounding:ok', 'generation.tier:ok']);
    expect(generator.complete.mock.calls[0]?.[2]).toMatchObject({ temperature: 0.7 });
  });

  it('applies configured temperatures', async () => {
    const generator = fakeService('openai', JSON.stringify(SHUFFLED_RECORDS));
    const pipeline = createVibePipeline({
      generation: [generator.service],
      options: { generationTemperature: 0.3 },
    });
    await pipeline.generate({ message: 'Hello' });
    expect(generator.complete.mock.calls[0]?.[2].temperature).toBe(0.3);
  });
});
