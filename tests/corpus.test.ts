import { describe, it, expect } from "vitest";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import {
  parseCorpus,
  JsonFileCorpus,
  findFreelancer,
  freelancersBySkill,
  freelancersByExperienceLevel,
  freelancersByHourlyRate,
} from "../src/corpus.ts";
import { CorpusLoadError } from "../src/utils/errors.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const SAMPLE_CORPUS = join(__dirname, "../data/freelancers.json");

const rawFreelancer = {
  freelancer_id: "F0100",
  name: "Test Freelancer",
  skills: ["Go", "Docker"],
  hourly_rate: 80,
  experience_years: 7,
  completed_projects: 1,
  avg_rating: 4.2,
  past_projects: [{ project_id: "P1", client_id: "C9", rating: 4 }],
};

describe("parseCorpus", () => {
  it("maps snake_case records and derives the experience level", () => {
    expect(parseCorpus([rawFreelancer])).toEqual([
      {
        id: "F0100",
        name: "Test Freelancer",
        skills: ["Go", "Docker"],
        hourlyRate: 80,
        experienceYears: 7,
        experienceLevel: "Advanced",
        completedProjects: 1,
        avgRating: 4.2,
        pastProjects: [{ projectId: "P1", clientId: "C9", rating: 4 }],
      },
    ]);
  });

  it("rejects a level that contradicts the years", () => {
    expect(() => parseCorpus([{ ...rawFreelancer, experience_level: "Entry" }], "test")).toThrow(
      "Could not load corpus from test: freelancer F0100 has 7 years but level Entry (expected Advanced)"
    );
  });

  it("rejects ratings outside 0-5", () => {
    expect(() =>
      parseCorpus([{ ...rawFreelancer, past_projects: [{ project_id: "P1", client_id: "C9", rating: 6 }] }])
    ).toThrow(CorpusLoadError);
  });

  it("rejects duplicate ids", () => {
    expect(() => parseCorpus([rawFreelancer, rawFreelancer], "test")).toThrow(
      "Could not load corpus from test: duplicate freelancer id F0100"
    );
  });

  it("rejects a non-array document", () => {
    expect(() => parseCorpus({ freelancers: [] })).toThrow(CorpusLoadError);
  });
});

describe("JsonFileCorpus", () => {
  it("loads the bundled sample corpus", () => {
    const freelancers = new JsonFileCorpus(SAMPLE_CORPUS).loadFreelancers();
    expect(freelancers).toHaveLength(8);
    expect(freelancers[0].id).toBe("F0001");
    expect(freelancers[0].pastProjects).toHaveLength(3);
  });

  it("raises CorpusLoadError for a missing file", () => {
    expect(() => new JsonFileCorpus(join(__dirname, "missing.json")).loadFreelancers()).toThrow(CorpusLoadError);
  });
});

describe("query helpers", () => {
  const corpus = new JsonFileCorpus(SAMPLE_CORPUS).loadFreelancers();

  it("finds by id", () => {
    expect(findFreelancer(corpus, "F0004")?.name).toBe("Freelancer F0004");
    expect(findFreelancer(corpus, "F9999")).toBeUndefined();
  });

  it("filters by skill case-insensitively", () => {
    expect(freelancersBySkill(corpus, "python").map((f) => f.id)).toEqual(["F0001", "F0003", "F0007"]);
  });

  it("filters by experience level", () => {
    expect(freelancersByExperienceLevel(corpus, "Expert").map((f) => f.id)).toEqual(["F0004", "F0008"]);
  });

  it("filters by hourly rate range", () => {
    expect(freelancersByHourlyRate(corpus, 30, 60).map((f) => f.id)).toEqual(["F0001", "F0002", "F0004", "F0007"]);
  });
});
