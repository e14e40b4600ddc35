import { toRankedCandidate } from "./content-score.ts";
import { InvalidWeightError } from "./utils/errors.ts";
import { round2 } from "./utils/vector.ts";
import type { CollaborativePrediction, Freelancer, RankedCandidate } from "./utils/types.ts";

export type FreelancerLookup = (id: string) => Freelancer | undefined;

/**
 * Blends content-based and collaborative scores:
 *
 *   hybrid = (1 - w) * content + w * collaborative
 *
 * A freelancer missing from one list scores 0 on that side. The result has
 * the same length as the content list. Equal scores keep the order of the
 * heavier side: content order while w <= 0.5, collaborative rank above it.
 * With no collaborative predictions the content list is returned as-is.
 */
export function blendRecommendations(
  content: readonly RankedCandidate[],
  collaborative: readonly CollaborativePrediction[],
  weight: number,
  lookup: FreelancerLookup
): RankedCandidate[] {
  if (!(weight >= 0 && weight <= 1)) throw new InvalidWeightError(weight);
  if (collaborative.length === 0) return [...content];

  const contentScores = new Map(content.map((c) => [c.freelancerId, c.matchScore]));
  const contentRank = new Map(content.map((c, i) => [c.freelancerId, i]));
  const cfScores = new Map(collaborative.map((c) => [c.freelancerId, c.matchScore]));
  const cfRank = new Map(collaborative.map((c, i) => [c.freelancerId, i]));
  const preferCollaborative = weight > 0.5;
  const ids = new Set([...contentScores.keys(), ...cfScores.keys()]);

  const blended: { freelancer: Freelancer; score: number; order: number }[] = [];
  for (const id of ids) {
    const freelancer = lookup(id);
    if (!freelancer) continue;
    const score = (1 - weight) * (contentScores.get(id) ?? 0) + weight * (cfScores.get(id) ?? 0);
    const order = preferCollaborative
      ? (cfRank.get(id) ?? collaborative.length)
      : (contentRank.get(id) ?? content.length);
    blended.push({ freelancer, score, order });
  }

  blended.sort(
    (a, b) =>
      b.score - a.score ||
      a.order - b.order ||
      (a.freelancer.id < b.freelancer.id ? -1 : a.freelancer.id > b.freelancer.id ? 1 : 0)
  );

  return blended
    .slice(0, content.length)
    .map((b, i) => toRankedCandidate(b.freelancer, i + 1, round2(b.score)));
}
