import { z } from 'zod';
import type { GenerationService } from '../models';
import { runWithDeadline } from '../deadline';
import { parseStructured } from '../parse';
import { MESSAGE_MAX_CHARS } from '../prompts/vibesPrompt';
import { truncateText } from '../text/truncate';
import { pushTrace, type TraceSink } from '../trace';

export type ToneAnalysis = {
  overall_tone: string;
  rationale: string;
  source: 'llm' | 'heuristic';
};

const ToneResponseSchema = z.object({
  overall_tone: z.string().min(1),
  rationale: z.string().optional(),
});

const HEURISTIC_RATIONALE =
  'Heuristic analysis based on presence of polite, urgent, apologetic, or positive keywords.';

/** First matching row wins. */
const TONE_KEYWORDS: ReadonlyArray<[tone: string, keywords: readonly string[]]> = [
  ['Polite', ['please', 'would you', 'kindly', 'appreciate']],
  ['Urgent', ['urgent', 'asap', 'now', 'immediately']],
  ['Apologetic', ['sorry', 'apologize', 'regret']],
  ['Positive', ['great', 'awesome', 'thanks', 'thank you']],
];

export function detectToneHeuristic(message: string): ToneAnalysis {
  const lowered = message.toLowerCase();
  const match = TONE_KEYWORDS.find(([, keywords]) => keywords.some((keyword) => lowered.includes(keyword)));
  return { overall_tone: match?.[0] ?? 'Neutral', rationale: HEURISTIC_RATIONALE, source: 'heuristic' };
}

const SYSTEM = `You analyze the tone of short user messages.
Return strict JSON with keys: overall_tone (string), rationale (string).`;

/**
 * Ask each service in turn for a tone reading; keyword heuristic when none answers
 * with the expected shape.
 */
export async function analyzeTone(
  message: string,
  services: GenerationService[],
  options?: { timeoutMs?: number; signal?: AbortSignal; sink?: TraceSink },
): Promise<ToneAnalysis> {
  const text = truncateText(message, MESSAGE_MAX_CHARS);
  const user = `Analyze the tone of this message and return JSON only.\n\nMessage: ${text}\n`;

  for (const service of services) {
    try {
      const raw = await runWithDeadline(
        (signal) => service.complete(SYSTEM, user, { temperature: 0.2, signal }),
        { timeoutMs: options?.timeoutMs ?? 8_000, signal: options?.signal },
      );
      const parsed = ToneResponseSchema.safeParse(parseStructured(raw));
      if (parsed.success) {
        pushTrace(options?.sink, { gate: 'tone', outcome: 'ok', meta: { service: service.name } });
        return {
          overall_tone: parsed.data.overall_tone,
          rationale: parsed.data.rationale ?? '',
          source: 'llm',
        };
      }
      pushTrace(options?.sink, {
        gate: 'tone',
        outcome: 'fallback',
        reason_code: 'contract_violation',
        meta: { service: service.name },
      });
    } catch (error) {
      pushTrace(options?.sink, {
        gate: 'tone',
        outcome: 'fallback',
        reason_code: 'provider_unavailable',
        meta: { service: service.name, error: String(error) },
      });
    }
  }

  return detectToneHeuristic(message);
}
