import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { logger } from "./logger.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CORPUS_PATH = join(__dirname, "../../data/freelancers.json");
export const DEFAULT_TOP_N = 5;
export const DEFAULT_CF_WEIGHT = 0.3;

export interface MatcherConfig {
  corpusPath: string;
  topN: number;
  collaborativeWeight: number;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0 || String(value) !== raw.trim()) {
    logger.warn(`Invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readWeight(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (isNaN(value) || value < 0 || value > 1) {
    logger.warn(`Invalid ${key}="${raw}" (expected 0-1), using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Reads matcher settings from the environment. The CLI loads `.env` through
 * dotenv before calling this.
 */
export function loadConfig(env: Env = process.env): MatcherConfig {
  const corpusRaw = env.MATCHER_CORPUS_PATH;
  return {
    corpusPath: corpusRaw ? resolve(corpusRaw) : DEFAULT_CORPUS_PATH,
    topN: readPositiveInt(env, "MATCHER_TOP_N", DEFAULT_TOP_N),
    collaborativeWeight: readWeight(env, "MATCHER_CF_WEIGHT", DEFAULT_CF_WEIGHT),
  };
}
