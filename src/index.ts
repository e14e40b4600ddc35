import "dotenv/config";
import { readFileSync } from "fs";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { logger } from "./utils/logger.ts";
import { loadConfig } from "./utils/config.ts";
import { formatCurrency, formatPercentage } from "./utils/format.ts";
import { JsonFileCorpus } from "./corpus.ts";
import { parseJob } from "./job.ts";
import { MatchingModel } from "./model.ts";
import type { RankedCandidate } from "./utils/types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const SAMPLE_JOB_PATH = join(__dirname, "../data/sample-job.json");

// ── CLI args ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const config = loadConfig();

function argValue(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

const jobPath = resolve(argValue("--job") ?? SAMPLE_JOB_PATH);
const corpusPath = argValue("--corpus") ? resolve(argValue("--corpus") ?? "") : config.corpusPath;
const clientId = argValue("--client");
const useCollaborative = args.includes("--collaborative");
const listSkills = args.includes("--skills");
const clientOnly = args.includes("--client-only");

const topRaw = argValue("--top");
const topParsed = topRaw !== undefined ? parseInt(topRaw, 10) : NaN;
const topN = !isNaN(topParsed) && topParsed > 0 ? topParsed : config.topN;
if (topRaw !== undefined && topN !== topParsed) logger.warn("Invalid --top value, ignoring");

const weightRaw = argValue("--weight");
const weightParsed = weightRaw !== undefined ? Number(weightRaw) : NaN;
const weight = weightParsed >= 0 && weightParsed <= 1 ? weightParsed : config.collaborativeWeight;
if (weightRaw !== undefined && weight !== weightParsed) logger.warn("Invalid --weight value, ignoring");

if (useCollaborative && !clientId) {
  logger.warn("--collaborative needs --client <id>; using content ranking only");
}

// ── Output ───────────────────────────────────────────────────────────

function printRanking(recommendations: RankedCandidate[]): void {
  for (const rec of recommendations) {
    logger.info(
      `  #${rec.rank} [${rec.matchScore.toFixed(2)}] ${rec.name} (${rec.freelancerId}) — ${rec.experienceLevel}, ${formatCurrency(rec.hourlyRate)}/h, rating ${rec.avgRating}`
    );
    const overlap = rec.skillOverlap !== undefined ? ` | Overlap: ${formatPercentage(rec.skillOverlap)}` : "";
    logger.info(`    Skills: ${rec.skills.join(", ")}${overlap}`);
  }
}

// ── Main ─────────────────────────────────────────────────────────────

function run(): void {
  const model = new MatchingModel();
  model.train(new JsonFileCorpus(corpusPath).loadFreelancers());

  if (listSkills) {
    const skills = model.supportedSkills();
    logger.info(`${skills.length} skill terms: ${skills.join(", ")}`);
    return;
  }

  if (clientOnly) {
    if (!clientId) {
      logger.error("--client-only needs --client <id>");
      process.exitCode = 1;
      return;
    }
    const predictions = model.predictForClient(clientId, topN);
    logger.info(`=== Collaborative recommendations for ${clientId} (${predictions.length}) ===`);
    for (const p of predictions) {
      logger.info(`  #${p.rank} [${p.matchScore.toFixed(2)}] ${p.name} (${p.freelancerId}) — predicted ${p.predictedRating}/5`);
    }
    return;
  }

  const job = parseJob(JSON.parse(readFileSync(jobPath, "utf-8")));
  logger.info(`=== Matching "${job.title}" against ${model.freelancerCount} freelancers ===`);

  const result = model.recommend(job, {
    clientId,
    useCollaborative,
    collaborativeWeight: weight,
    topN,
  });

  if (result.collaborativeApplied) {
    logger.info(`Blended with collaborative signal for ${clientId} (weight ${weight})`);
  }
  printRanking(result.recommendations);
  logger.info(`${result.totalMatches} matches`);
}

try {
  run();
} catch (err) {
  logger.error("Fatal error", err);
  process.exit(1);
}
