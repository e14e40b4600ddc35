import type { ExperienceLevel } from "./utils/types.ts";

// ── Tier boundaries (years of experience) ────────────────────────────

const TIER_BOUNDARIES: [number, ExperienceLevel][] = [
  [2, "Entry"],
  [5, "Intermediate"],
  [10, "Advanced"],
];

export function experienceLevelForYears(years: number): ExperienceLevel {
  for (const [maxYears, level] of TIER_BOUNDARIES) {
    if (years <= maxYears) return level;
  }
  return "Expert";
}

// ── Ordinal mapping ──────────────────────────────────────────────────

const LEVEL_ORDINALS: Record<ExperienceLevel, number> = {
  Entry: 1,
  Intermediate: 2,
  Advanced: 3,
  Expert: 4,
};

const MAX_ORDINAL = 4;
const DEFAULT_ORDINAL = LEVEL_ORDINALS.Intermediate;

export function isExperienceLevel(level: string): level is ExperienceLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDINALS, level);
}

/** Ordinal 1-4; unknown levels count as Intermediate. */
export function experienceLevelValue(level: string): number {
  return isExperienceLevel(level) ? LEVEL_ORDINALS[level] : DEFAULT_ORDINAL;
}

export function normalizedExperienceLevel(level: string): number {
  return experienceLevelValue(level) / MAX_ORDINAL;
}
