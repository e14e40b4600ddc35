import { z } from "zod";
import { camelizeKeys } from "./utils/keys.ts";
import { InvalidJobError, MalformedBudgetError } from "./utils/errors.ts";
import type { Job } from "./utils/types.ts";

// ── Schemas ──────────────────────────────────────────────────────────

const hourlyBudgetSchema = z.object({
  type: z.literal("hourly"),
  minRate: z.number().nonnegative("minRate must be 0 or more"),
  maxRate: z.number().nonnegative("maxRate must be 0 or more"),
});

const fixedBudgetSchema = z.object({
  type: z.literal("fixed"),
  amount: z.number().positive("amount must be greater than 0"),
});

export const budgetSchema = z.discriminatedUnion("type", [hourlyBudgetSchema, fixedBudgetSchema]);

export const jobSchema = z.object({
  title: z.string().min(1, "title is required"),
  description: z.string().optional(),
  skillsRequired: z.array(z.string()),
  budget: budgetSchema,
  experienceLevel: z.string().min(1, "experienceLevel is required"),
  timelineDays: z.number().int().nonnegative(),
});

// ── Parsing ──────────────────────────────────────────────────────────

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validates an untrusted job payload (camelCase or snake_case keys).
 * Budget problems raise MalformedBudgetError before anything else is
 * reported, since no score can be computed without a usable budget.
 */
export function parseJob(input: unknown): Job {
  const result = jobSchema.safeParse(camelizeKeys(input));

  if (!result.success) {
    const budgetIssues = result.error.issues.filter((i) => i.path[0] === "budget");
    if (budgetIssues.length > 0) {
      throw new MalformedBudgetError(budgetIssues.map(formatIssue));
    }
    throw new InvalidJobError(result.error.issues.map(formatIssue));
  }

  const job = result.data;
  if (job.budget.type === "hourly" && job.budget.minRate > job.budget.maxRate) {
    throw new MalformedBudgetError(["budget.maxRate: must be at least minRate"]);
  }
  return job;
}
