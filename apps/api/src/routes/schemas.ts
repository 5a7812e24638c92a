import { z } from 'zod';
import { DEFAULT_TOP_COUNT, MAX_TOP_COUNT } from '@vibes/core';

const requiredText = z.string().trim().min(1);

export const RewriteVibesRequestSchema = z.object({
  message: requiredText,
  platform: z.string().nullish(),
  user_id: z.string().nullish(),
});

export const RewriteTopRequestSchema = RewriteVibesRequestSchema.extend({
  target_tone: requiredText,
  num_candidates: z.number().int().min(1).max(MAX_TOP_COUNT).default(DEFAULT_TOP_COUNT),
});

export const FeedbackRequestSchema = z.object({
  user_id: requiredText,
  message: requiredText,
  accepted_text: requiredText,
  target_tone: requiredText,
  platform: z.string().nullish(),
});

export type RewriteVibesRequest = z.infer<typeof RewriteVibesRequestSchema>;
export type RewriteTopRequest = z.infer<typeof RewriteTopRequestSchema>;
export type FeedbackRequest = z.infer<typeof FeedbackRequestSchema>;
