import { normalizedExperienceLevel } from "./experience.ts";
import { NotFittedError } from "./utils/errors.ts";
import type { FeatureVocabulary } from "./vocabulary.ts";
import type {
  Budget,
  Freelancer,
  FreelancerFeatures,
  Job,
  JobFeatures,
} from "./utils/types.ts";

// Fixed-budget jobs state no hourly rate, so they sit mid-range
export const FIXED_BUDGET_RATE_PLACEHOLDER = 0.5;

/**
 * Midpoint of an hourly budget. A missing lower bound reads as 0 and a
 * missing upper bound collapses onto the lower one.
 */
export function hourlyBudgetMidpoint(budget: { minRate?: number; maxRate?: number }): number {
  const min = Number.isFinite(budget.minRate) ? Number(budget.minRate) : 0;
  const max = Number.isFinite(budget.maxRate) ? Number(budget.maxRate) : min;
  return (min + max) / 2;
}

export class FeatureTransformer {
  constructor(private readonly vocabulary: FeatureVocabulary) {}

  transformFreelancer(freelancer: Freelancer): FreelancerFeatures {
    this.requireFitted();
    return {
      skills: this.vocabulary.skills.transform(freelancer.skills),
      hourlyRate: this.vocabulary.rate.transform(freelancer.hourlyRate),
      experienceYears: this.vocabulary.experience.transform(freelancer.experienceYears),
      experienceLevel: normalizedExperienceLevel(freelancer.experienceLevel),
      avgRating: this.vocabulary.rating.transform(freelancer.avgRating),
    };
  }

  transformJob(job: Job): JobFeatures {
    this.requireFitted();
    const { hourlyRate, rateIsPlaceholder } = this.budgetRate(job.budget);
    return {
      skills: this.vocabulary.skills.transform(job.skillsRequired),
      hourlyRate,
      experienceLevel: normalizedExperienceLevel(job.experienceLevel),
      rateIsPlaceholder,
    };
  }

  private budgetRate(budget: Budget): { hourlyRate: number; rateIsPlaceholder: boolean } {
    if (budget.type === "hourly") {
      return {
        hourlyRate: this.vocabulary.rate.transform(hourlyBudgetMidpoint(budget)),
        rateIsPlaceholder: false,
      };
    }
    return { hourlyRate: FIXED_BUDGET_RATE_PLACEHOLDER, rateIsPlaceholder: true };
  }

  private requireFitted(): void {
    if (!this.vocabulary.isFitted) throw new NotFittedError("FeatureTransformer");
  }
}
