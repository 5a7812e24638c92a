export * from './models';
export * from './trace';
export * from './deadline';
export { parseStructured, isUnparsed } from './parse';
export { truncateText, previewText } from './text/truncate';
export { VIBE_ORDER, VIBE_TEMPLATES, staticVibeTemplates, isVibeName } from './vibes/templates';
export { CandidateRecordSchema, CandidateListSchema, MAX_USE_CASES } from './vibes/schema';
export type { CandidateRecord } from './vibes/schema';
export { validateCandidateRecords } from './vibes/validate';
export {
  GENERIC_RULES,
  DEFAULT_PLATFORM_RULES,
  createPlatformRulesProvider,
  normalizePlatform,
} from './platform/rules';
export { validatePlatform, countHashtags } from './platform/validate';
export { createGroundingClient, GROUNDING_TOP_K } from './grounding/client';
export type { GroundingClient } from './grounding/client';
export { buildVibesPrompt, MESSAGE_MAX_CHARS } from './prompts/vibesPrompt';
export { buildRankPrompt, candidateIds } from './prompts/rankPrompt';
export * from './generation/tiers';
export * from './generation/orchestrator';
export { heuristicScore, lengthBucketScore, TONE_BONUS } from './ranking/heuristic';
export { readScores, toScore } from './ranking/scores';
export * from './ranking/scorers';
export * from './ranking/rank';
export { analyzeTone, detectToneHeuristic } from './tone/analyze';
export type { ToneAnalysis } from './tone/analyze';
export * from './pipeline';
