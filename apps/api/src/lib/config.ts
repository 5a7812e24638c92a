/**
 * Process configuration, read once from the environment at startup.
 * Core code never reads env; it receives these values through createVibePipeline.
 */

import path from 'node:path';

export type Env = Record<string, string | undefined>;

export type VibesConfig = {
  tierTimeoutMs: number;
  scoringTimeoutMs: number;
  groundingTimeoutMs: number;
  generationTemperature: number;
  scoringTemperature: number;
  dataDir: string;
  debug: boolean;
  /** Listening port for the standalone server. */
  port: number;
};

const readString = (env: Env, key: string) => (env[key] ?? '').trim();

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function getVibesConfig(env: Env = process.env): VibesConfig {
  return {
    tierTimeoutMs: readNumber(env, 'VIBES_TIER_TIMEOUT_MS', 12_000),
    scoringTimeoutMs: readNumber(env, 'VIBES_SCORING_TIMEOUT_MS', 10_000),
    groundingTimeoutMs: readNumber(env, 'VIBES_GROUNDING_TIMEOUT_MS', 2_000),
    generationTemperature: readNumber(env, 'VIBES_GENERATION_TEMPERATURE', 0.7),
    scoringTemperature: readNumber(env, 'VIBES_RANKING_TEMPERATURE', 0.2),
    dataDir: readString(env, 'VIBES_DATA_DIR') || path.join(process.cwd(), 'data'),
    debug: readString(env, 'VIBES_DEBUG') === '1',
    port: readNumber(env, 'PORT', 8000),
  };
}
