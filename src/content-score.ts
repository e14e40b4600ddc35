import { cosineSimilarity, round2 } from "./utils/vector.ts";
import type {
  Freelancer,
  FreelancerFeatures,
  JobFeatures,
  RankedCandidate,
  ScoreBreakdown,
} from "./utils/types.ts";

// ── Feature weights ──────────────────────────────────────────────────

export const FEATURE_WEIGHTS: Readonly<ScoreBreakdown> = Object.freeze({
  skills: 0.5,
  experience: 0.2,
  hourlyRate: 0.15,
  rating: 0.15,
});

export const DEFAULT_TOP_N = 5;

// ── Sub-scores ───────────────────────────────────────────────────────

export function skillSimilarity(jobSkills: readonly number[], freelancerSkills: readonly number[]): number {
  return cosineSimilarity(jobSkills, freelancerSkills);
}

/** 1 when the normalized rates are identical, falling linearly to 0. */
export function budgetCompatibility(jobRate: number, freelancerRate: number): number {
  return 1 - Math.abs(jobRate - freelancerRate);
}

export function experienceCompatibility(required: number, actual: number): number {
  if (actual >= required) return 1;
  return required > 0 ? actual / required : 0;
}

// ── Overall score ────────────────────────────────────────────────────

export interface MatchScore {
  score: number; // [0, 1]
  breakdown: ScoreBreakdown;
}

export function scoreMatch(job: JobFeatures, freelancer: FreelancerFeatures): MatchScore {
  const breakdown: ScoreBreakdown = {
    skills: skillSimilarity(job.skills, freelancer.skills),
    experience: experienceCompatibility(job.experienceLevel, freelancer.experienceLevel),
    hourlyRate: budgetCompatibility(job.hourlyRate, freelancer.hourlyRate),
    rating: freelancer.avgRating,
  };

  const score =
    FEATURE_WEIGHTS.skills * breakdown.skills +
    FEATURE_WEIGHTS.experience * breakdown.experience +
    FEATURE_WEIGHTS.hourlyRate * breakdown.hourlyRate +
    FEATURE_WEIGHTS.rating * breakdown.rating;

  return { score, breakdown };
}

// ── Ranking ──────────────────────────────────────────────────────────

export interface ScoringCandidate {
  freelancer: Freelancer;
  features: FreelancerFeatures;
}

export function toRankedCandidate(freelancer: Freelancer, rank: number, matchScore: number): RankedCandidate {
  return {
    rank,
    freelancerId: freelancer.id,
    name: freelancer.name,
    matchScore,
    skills: freelancer.skills,
    hourlyRate: freelancer.hourlyRate,
    experienceLevel: freelancer.experienceLevel,
    completedProjects: freelancer.completedProjects,
    avgRating: freelancer.avgRating,
  };
}

/**
 * Scores every candidate against the job and returns the top N by score.
 * Equal scores are ordered by freelancer id so the result does not depend
 * on corpus order.
 */
export function rankCandidates(
  job: JobFeatures,
  candidates: readonly ScoringCandidate[],
  topN: number = DEFAULT_TOP_N
): RankedCandidate[] {
  const scored = candidates.map((c) => ({
    freelancer: c.freelancer,
    score: scoreMatch(job, c.features).score,
  }));

  scored.sort(
    (a, b) =>
      b.score - a.score ||
      (a.freelancer.id < b.freelancer.id ? -1 : a.freelancer.id > b.freelancer.id ? 1 : 0)
  );

  return scored
    .slice(0, Math.max(0, topN))
    .map((s, i) => toRankedCandidate(s.freelancer, i + 1, round2(s.score * 100)));
}

/**
 * Jaccard overlap between two skill lists, compared case-insensitively.
 * 0 when either list is empty.
 */
export function skillOverlap(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  const setA = new Set(a.map((s) => s.toLowerCase()));
  const setB = new Set(b.map((s) => s.toLowerCase()));
  let shared = 0;
  for (const s of setA) if (setB.has(s)) shared++;
  return shared / (setA.size + setB.size - shared);
}
