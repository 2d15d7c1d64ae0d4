import { DigestConfigSchema, type DigestConfig } from "../src/config.js";
import { MS_PER_DAY } from "../src/scoring/time.js";
import type {
  AnalyzedProject,
  CandidateProject,
  ScoredProject,
} from "../src/sources/types.js";

export const NOW = new Date("2026-10-19T12:00:00Z");

export function daysAgo(days: number, from: Date = NOW): string {
  return new Date(from.getTime() - days * MS_PER_DAY).toISOString();
}

export const LONG_DESCRIPTION =
  "A command-line toolkit for building, evaluating and shipping machine learning pipelines on commodity hardware.";

/** Scores 83.65 under the "established" profile at NOW. */
export function makeCandidate(
  overrides: Partial<CandidateProject> = {}
): CandidateProject {
  return {
    name: "acme/toolkit",
    url: "https://github.com/acme/toolkit",
    description: LONG_DESCRIPTION,
    language: "Python",
    stars: 10_000,
    forks: 600,
    openIssues: 50,
    size: 2048,
    topics: ["ai", "ml", "cli"],
    createdAt: daysAgo(400),
    pushedAt: daysAgo(2),
    ...overrides,
  };
}

export function makeScored(
  name: string,
  qualityScore: number,
  overrides: Partial<ScoredProject> = {}
): ScoredProject {
  return {
    ...makeCandidate({ name, url: `https://github.com/${name}` }),
    qualityScore,
    ...overrides,
  };
}

export function makeAnalyzed(
  overrides: Partial<AnalyzedProject> = {}
): AnalyzedProject {
  return {
    ...makeCandidate(),
    qualityScore: 83.65,
    analysis: "A toolkit for ML pipelines.",
    ...overrides,
  };
}

type ConfigOverrides = {
  [K in keyof DigestConfig]?: Record<string, unknown>;
};

export function makeConfig(overrides: ConfigOverrides = {}): DigestConfig {
  const { search, ...rest } = overrides;
  return DigestConfigSchema.parse({
    search: {
      keywords: ["ai"],
      min_stars: 100,
      max_results: 5,
      update_within_days: 7,
      ...search,
    },
    ...rest,
  });
}
