import { describe, expect, it } from 'vitest';
import { buildRankPrompt, candidateIds } from '../prompts/rankPrompt';
import { buildVibesPrompt } from '../prompts/vibesPrompt';
import { previewText, truncateText } from '../text/truncate';
import { VIBE_TEMPLATES } from '../vibes/templates';

describe('buildVibesPrompt', () => {
  it('fixes the output contract in the system prompt', () => {
    const { system } = buildVibesPrompt({ message: 'Hi', vibes: VIBE_TEMPLATES, grounding: [], topK: 5 });
    expect(system).toContain('exactly 5 objects');
    expect(system).toContain('The vibe values must be exactly: Professional, Friendly, Persuasive, Concise, Empathetic, in that order.');
  });

  it('bounds the message, guidance and grounding excerpts', () => {
    const grounding = Array.from({ length: 7 }, (_, i) => ({ title: `doc${i}`, text: 'g'.repeat(300), relevance: 1 }));
    const { user } = buildVibesPrompt({ message: 'm'.repeat(2500), vibes: VIBE_TEMPLATES, grounding, topK: 5 });

    expect(user).toContain(`Message: ${'m'.repeat(1997)}...\n`);
    expect(user).toContain(`- doc4: ${'g'.repeat(240)}...`);
    expect(user).not.toContain('- doc5:');
    for (const line of user.split('\n').filter((entry) => /^- (Professional|Friendly|Persuasive|Concise|Empathetic):/.test(entry))) {
      expect(line.length).toBeLessThanOrEqual('- Professional: '.length + 183);
    }
  });

  it('omits the grounding block when nothing was retrieved', () => {
    const { user } = buildVibesPrompt({ message: 'Hi', vibes: VIBE_TEMPLATES, grounding: [], topK: 5 });
    expect(user).not.toContain('Retrieved guidance');
  });
});

describe('buildRankPrompt', () => {
  it('labels candidates with explicit ids', () => {
    const { user } = buildRankPrompt({
      ids: candidateIds(2),
      texts: ['first', 'second'],
      message: 'orig',
      targetTone: 'Friendly',
      platform: null,
    });
    expect(user).toBe('Target tone: Friendly\nPlatform: generic\n\nOriginal message: orig\n\nCandidates:\n- [c1] first\n- [c2] second\n');
  });
});

describe('truncation', () => {
  it('replaces the suffix with an ellipsis', () => {
    expect(truncateText('abcdefgh', 6)).toBe('abc...');
    expect(truncateText('abc', 6)).toBe('abc');
    expect(previewText('abcdefgh', 3)).toBe('abc...');
    expect(truncateText('😀'.repeat(8), 6)).toBe('😀😀😀...');
    expect(truncateText('😀'.repeat(6), 6)).toBe('😀'.repeat(6));
    expect(previewText('👍👍👍👍', 3)).toBe('👍👍👍...');
  });
});
