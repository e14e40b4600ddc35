import { experienceLevelForYears } from "../src/experience.ts";
import type { Engagement, Freelancer, Job } from "../src/utils/types.ts";

export function makeFreelancer(overrides: Partial<Freelancer> & { id: string }): Freelancer {
  const experienceYears = overrides.experienceYears ?? 4;
  return {
    name: `Freelancer ${overrides.id}`,
    skills: ["Python"],
    hourlyRate: 30,
    experienceLevel: experienceLevelForYears(experienceYears),
    completedProjects: 0,
    avgRating: 4.5,
    pastProjects: [],
    ...overrides,
    experienceYears,
  };
}

export function engagement(clientId: string, rating: number, projectId = `P-${clientId}`): Engagement {
  return { projectId, clientId, rating };
}

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    title: "Test job",
    skillsRequired: ["Python", "React"],
    budget: { type: "hourly", minRate: 20, maxRate: 40 },
    experienceLevel: "Intermediate",
    timelineDays: 30,
    ...overrides,
  };
}

// Three freelancers identical except for skills
export const SCENARIO_CORPUS: Freelancer[] = [
  makeFreelancer({ id: "f1", skills: ["Python", "SQL"] }),
  makeFreelancer({ id: "f2", skills: ["Python", "React"] }),
  makeFreelancer({ id: "f3", skills: ["React", "CSS"] }),
];
