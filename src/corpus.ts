import { readFileSync } from "fs";
import { z } from "zod";
import { logger } from "./utils/logger.ts";
import { camelizeKeys } from "./utils/keys.ts";
import { CorpusLoadError } from "./utils/errors.ts";
import { experienceLevelForYears } from "./experience.ts";
import { EXPERIENCE_LEVELS } from "./utils/types.ts";
import type { ExperienceLevel, Freelancer } from "./utils/types.ts";

/** Where the training corpus comes from. The matcher never writes back. */
export interface CorpusSource {
  loadFreelancers(): Freelancer[];
}

// ── Schema ───────────────────────────────────────────────────────────

const engagementSchema = z.object({
  projectId: z.string(),
  clientId: z.string().min(1),
  rating: z.number().int().min(0).max(5),
  title: z.string().optional(),
  skills: z.array(z.string()).optional(),
  durationDays: z.number().optional(),
  budget: z.number().optional(),
});

const freelancerSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  skills: z.array(z.string()),
  hourlyRate: z.number().positive(),
  experienceYears: z.number().int().nonnegative(),
  experienceLevel: z.enum(EXPERIENCE_LEVELS).optional(),
  completedProjects: z.number().int().nonnegative(),
  avgRating: z.number().min(0).max(5),
  pastProjects: z.array(engagementSchema).default([]),
  country: z.string().optional(),
  availability: z.string().optional(),
});

type FreelancerRecord = z.infer<typeof freelancerSchema>;

// Exported data files key freelancers by `freelancer_id`
function withId(record: unknown): unknown {
  if (typeof record !== "object" || record === null || Array.isArray(record)) return record;
  if ("id" in record) return record;
  if (!("freelancerId" in record)) return record;
  const { freelancerId, ...rest } = record;
  return { id: freelancerId, ...rest };
}

function toFreelancer(record: FreelancerRecord, source: string): Freelancer {
  const tier: ExperienceLevel = experienceLevelForYears(record.experienceYears);
  if (record.experienceLevel && record.experienceLevel !== tier) {
    throw new CorpusLoadError(
      source,
      `freelancer ${record.id} has ${record.experienceYears} years but level ${record.experienceLevel} (expected ${tier})`
    );
  }
  return { ...record, experienceLevel: tier };
}

/**
 * Validates raw corpus data. Missing experience levels are derived from
 * years; a level that contradicts the years is rejected.
 */
export function parseCorpus(input: unknown, source: string = "input"): Freelancer[] {
  const camel = camelizeKeys(input);
  const records = Array.isArray(camel) ? camel.map(withId) : camel;
  const result = z.array(freelancerSchema).safeParse(records);

  if (!result.success) {
    const first = result.error.issues[0];
    const where = first.path.length > 0 ? `${first.path.join(".")}: ` : "";
    throw new CorpusLoadError(source, `${where}${first.message}`);
  }

  const seen = new Set<string>();
  const freelancers: Freelancer[] = [];
  for (const record of result.data) {
    if (seen.has(record.id)) {
      throw new CorpusLoadError(source, `duplicate freelancer id ${record.id}`);
    }
    seen.add(record.id);
    freelancers.push(toFreelancer(record, source));
  }
  return freelancers;
}

export class JsonFileCorpus implements CorpusSource {
  constructor(private readonly path: string) {}

  loadFreelancers(): Freelancer[] {
    let raw: string;
    try {
      raw = readFileSync(this.path, "utf-8");
    } catch (err) {
      throw new CorpusLoadError(this.path, err instanceof Error ? err.message : String(err));
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new CorpusLoadError(this.path, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }

    const freelancers = parseCorpus(data, this.path);
    logger.info(`Loaded ${freelancers.length} freelancers from ${this.path}`);
    return freelancers;
  }
}

// ── Query helpers ────────────────────────────────────────────────────

export function findFreelancer(corpus: readonly Freelancer[], id: string): Freelancer | undefined {
  return corpus.find((f) => f.id === id);
}

export function freelancersBySkill(corpus: readonly Freelancer[], skill: string): Freelancer[] {
  const wanted = skill.toLowerCase();
  return corpus.filter((f) => f.skills.some((s) => s.toLowerCase() === wanted));
}

export function freelancersByExperienceLevel(
  corpus: readonly Freelancer[],
  level: ExperienceLevel
): Freelancer[] {
  return corpus.filter((f) => f.experienceLevel === level);
}

export function freelancersByHourlyRate(
  corpus: readonly Freelancer[],
  minRate: number,
  maxRate: number
): Freelancer[] {
  return corpus.filter((f) => f.hourlyRate >= minRate && f.hourlyRate <= maxRate);
}
