type RankPromptInput = {
  ids: string[];
  texts: string[];
  message: string;
  targetTone: string;
  platform?: string | null;
};

export function candidateIds(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `c${index + 1}`);
}

export function buildRankPrompt({ ids, texts, message, targetTone, platform }: RankPromptInput) {
  const system = `You are a precise evaluator. Score each candidate from 0 to 10 based on:
1) Tone alignment to the requested tone,
2) Clarity and readability,
3) Fit for the specified platform.
Return a strict JSON object mapping every candidate id to its numeric score, for example {"c1": 7.5, "c2": 6}.
Include each id exactly once and nothing else.`;

  const lines = ids.map((id, index) => `- [${id}] ${texts[index] ?? ''}`).join('\n');

  const user = `Target tone: ${targetTone}
Platform: ${platform?.trim() || 'generic'}

Original message: ${message}

Candidates:
${lines}
`;

  return { system, user };
}
