import { logger } from "./utils/logger.ts";
import { NotFittedError } from "./utils/errors.ts";
import { round2 } from "./utils/vector.ts";
import { FeatureVocabulary } from "./vocabulary.ts";
import { FeatureTransformer } from "./transform.ts";
import { CollaborativeModel } from "./collaborative.ts";
import { blendRecommendations } from "./hybrid.ts";
import { parseJob } from "./job.ts";
import { DEFAULT_TOP_N, rankCandidates, skillOverlap } from "./content-score.ts";
import type { ScoringCandidate } from "./content-score.ts";
import type { InteractionMatrix } from "./collaborative.ts";
import type {
  CollaborativeRecommendation,
  Freelancer,
  FreelancerFeatures,
  Job,
  RecommendationResult,
} from "./utils/types.ts";

export const DEFAULT_COLLABORATIVE_WEIGHT = 0.3;

export type ModelStatus = "untrained" | "training" | "trained";

export interface RecommendOptions {
  clientId?: string;
  useCollaborative?: boolean;
  collaborativeWeight?: number;
  topN?: number;
}

// Everything derived from one corpus. Built in full, then swapped in.
interface Snapshot {
  freelancers: readonly Freelancer[];
  byId: ReadonlyMap<string, Freelancer>;
  vocabulary: FeatureVocabulary;
  transformer: FeatureTransformer;
  candidates: readonly ScoringCandidate[];
  collaborative: CollaborativeModel;
  trainedAt: string;
}

/**
 * Owns the fitted vocabulary, freelancer feature vectors and interaction
 * matrix. Reads require a completed `train()`; they never train lazily.
 */
export class MatchingModel {
  private snapshot: Snapshot | null = null;
  private _status: ModelStatus = "untrained";

  get status(): ModelStatus {
    return this._status;
  }

  get trainedAt(): string | null {
    return this.snapshot?.trainedAt ?? null;
  }

  get freelancerCount(): number {
    return this.snapshot?.freelancers.length ?? 0;
  }

  /**
   * Fits everything from the corpus. On failure the previous snapshot (if
   * any) stays in place.
   */
  train(freelancers: readonly Freelancer[]): void {
    const previous = this._status;
    this._status = "training";
    const start = Date.now();

    try {
      const corpus = [...freelancers];
      const vocabulary = new FeatureVocabulary();
      vocabulary.fit(corpus);
      const transformer = new FeatureTransformer(vocabulary);

      const candidates = corpus.map((freelancer) => ({
        freelancer,
        features: transformer.transformFreelancer(freelancer),
      }));

      const collaborative = new CollaborativeModel();
      collaborative.train(corpus);

      this.snapshot = {
        freelancers: corpus,
        byId: new Map(corpus.map((f) => [f.id, f])),
        vocabulary,
        transformer,
        candidates,
        collaborative,
        trainedAt: new Date().toISOString(),
      };
      this._status = "trained";

      logger.info(
        `Trained on ${corpus.length} freelancers (${vocabulary.skills.size} skill terms) in ${Date.now() - start}ms`
      );
    } catch (err) {
      this._status = previous;
      logger.error("Training failed", err);
      throw err;
    }
  }

  /**
   * Ranks freelancers for a job by content score, then re-ranks with
   * collaborative affinities when `useCollaborative` and `clientId` are both
   * set.
   */
  recommend(job: Job, options: RecommendOptions = {}): RecommendationResult {
    const snapshot = this.requireSnapshot();
    const validJob = parseJob(job);
    const topN = options.topN ?? DEFAULT_TOP_N;

    const features = snapshot.transformer.transformJob(validJob);
    if (features.rateIsPlaceholder) {
      logger.debug(`Fixed budget for "${validJob.title}" — rate compatibility uses placeholder`);
    }

    let recommendations = rankCandidates(features, snapshot.candidates, topN);
    let collaborativeApplied = false;

    if (options.useCollaborative && options.clientId) {
      const predictions = snapshot.collaborative.predictForClient(options.clientId);
      if (predictions.length > 0) {
        recommendations = blendRecommendations(
          recommendations,
          predictions,
          options.collaborativeWeight ?? DEFAULT_COLLABORATIVE_WEIGHT,
          (id) => snapshot.byId.get(id)
        );
        collaborativeApplied = true;
      } else {
        logger.info(`No collaborative signal for client ${options.clientId}, using content ranking`);
      }
    }

    return {
      recommendations: recommendations.map((r) => ({
        ...r,
        skillOverlap: round2(skillOverlap(validJob.skillsRequired, r.skills)),
      })),
      totalMatches: recommendations.length,
      collaborativeApplied,
    };
  }

  predictForClient(clientId: string, topN: number = DEFAULT_TOP_N): CollaborativeRecommendation[] {
    const snapshot = this.requireSnapshot();
    const recommendations: CollaborativeRecommendation[] = [];

    for (const prediction of snapshot.collaborative.predictForClient(clientId, topN)) {
      const freelancer = snapshot.byId.get(prediction.freelancerId);
      if (!freelancer) continue;
      recommendations.push({
        ...prediction,
        name: freelancer.name,
        skills: freelancer.skills,
        hourlyRate: freelancer.hourlyRate,
        experienceLevel: freelancer.experienceLevel,
      });
    }
    return recommendations;
  }

  supportedSkills(): string[] {
    return this.requireSnapshot().vocabulary.skillTerms();
  }

  freelancerVector(id: string): FreelancerFeatures | undefined {
    return this.requireSnapshot().candidates.find((c) => c.freelancer.id === id)?.features;
  }

  interactionMatrix(): InteractionMatrix {
    return this.requireSnapshot().collaborative.interactionMatrix();
  }

  private requireSnapshot(): Snapshot {
    if (this._status !== "trained" || !this.snapshot) {
      throw new NotFittedError("MatchingModel");
    }
    return this.snapshot;
  }
}
