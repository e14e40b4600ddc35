// ── Experience tiers ─────────────────────────────────────────────────

export const EXPERIENCE_LEVELS = ["Entry", "Intermediate", "Advanced", "Expert"] as const;

export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

// ── Past engagement (one project between a client and a freelancer) ──

export interface Engagement {
  projectId: string;
  clientId: string;
  rating: number; // integer in [0, 5]
  title?: string;
  skills?: string[];
  durationDays?: number;
  budget?: number;
}

// ── Freelancer profile from the corpus ──────────────────────────────

export interface Freelancer {
  id: string;
  name: string;
  skills: string[];
  hourlyRate: number;
  experienceYears: number;
  experienceLevel: ExperienceLevel;
  completedProjects: number;
  avgRating: number; // [0, 5]
  pastProjects: Engagement[];
  country?: string;
  availability?: string;
}

// ── Job posting (ephemeral, one per request) ────────────────────────

export interface HourlyBudget {
  type: "hourly";
  minRate: number;
  maxRate: number;
}

export interface FixedBudget {
  type: "fixed";
  amount: number;
}

export type Budget = HourlyBudget | FixedBudget;

export interface Job {
  title: string;
  description?: string; // not used in scoring
  skillsRequired: string[];
  budget: Budget;
  experienceLevel: string;
  timelineDays: number; // not used in scoring
}

// ── Feature vectors (derived, never persisted) ──────────────────────

export interface FreelancerFeatures {
  skills: number[];
  hourlyRate: number;
  experienceYears: number;
  experienceLevel: number;
  avgRating: number;
}

export interface JobFeatures {
  skills: number[];
  hourlyRate: number;
  experienceLevel: number;
  // Fixed-budget jobs carry no rate; hourlyRate is then a 0.5 placeholder
  rateIsPlaceholder: boolean;
}

// ── Scoring output ──────────────────────────────────────────────────

export interface ScoreBreakdown {
  skills: number;
  experience: number;
  hourlyRate: number;
  rating: number;
}

export interface RankedCandidate {
  rank: number;
  freelancerId: string;
  name: string;
  matchScore: number; // 0-100
  skills: string[];
  hourlyRate: number;
  experienceLevel: ExperienceLevel;
  completedProjects: number;
  avgRating: number;
  skillOverlap?: number;
}

export interface CollaborativePrediction {
  rank: number;
  freelancerId: string;
  predictedRating: number; // 0-5
  matchScore: number; // 0-100
}

export interface CollaborativeRecommendation extends CollaborativePrediction {
  name: string;
  skills: string[];
  hourlyRate: number;
  experienceLevel: ExperienceLevel;
}

export interface RecommendationResult {
  recommendations: RankedCandidate[];
  totalMatches: number;
  collaborativeApplied: boolean;
}
