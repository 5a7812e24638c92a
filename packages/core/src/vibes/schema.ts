import { z } from 'zod';
import { VIBE_ORDER } from './templates';

export const MAX_USE_CASES = 4;

export const CandidateRecordSchema = z.object({
  vibe: z.string().min(1),
  rewritten_text: z.string(),
  explanation: z.string(),
  use_cases: z.array(z.string()),
});

export const CandidateListSchema = z.array(CandidateRecordSchema).length(VIBE_ORDER.length);

export type CandidateRecord = z.infer<typeof CandidateRecordSchema>;
