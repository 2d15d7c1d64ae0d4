import * as core from "@actions/core";
import { dedup } from "./filter/dedup.js";
import { ensureDiversity, UNKNOWN_LANGUAGE } from "./filter/diversity.js";
import { filterProjects, resolveFilterPolicy } from "./filter/pipeline.js";
import type { DigestConfig } from "./config.js";
import type { CandidateProject, ScoredProject } from "./sources/types.js";

export interface RankingOutcome {
  candidates: number;
  passedThreshold: number;
  passedFilters: number;
  relaxed: boolean;
  projects: ScoredProject[];
}

export function averageScore(projects: ScoredProject[]): number | undefined {
  if (projects.length === 0) return undefined;
  const total = projects.reduce((sum, p) => sum + p.qualityScore, 0);
  return total / projects.length;
}

/**
 * Turns one batch of fetched candidates into the final ordered selection:
 * dedup, score, threshold, predicate filters (relaxed once if needed),
 * language diversity, and truncation to `max_results`.
 */
export function rankCandidates(
  candidates: CandidateProject[],
  config: DigestConfig,
  now: Date = new Date()
): RankingOutcome {
  const unique = dedup(candidates);
  const policy = resolveFilterPolicy(config);
  core.info(`Scoring ${unique.length} candidates with the "${policy.profile.name}" profile`);

  const filtered = filterProjects(unique, policy, now);

  const maxResults = config.search.max_results;
  const target = config.diversity.target ?? maxResults;
  const diverse = ensureDiversity(filtered.projects, target);
  const projects = diverse.slice(0, maxResults);

  const languages = new Set(projects.map((p) => p.language ?? UNKNOWN_LANGUAGE));
  const average = averageScore(projects);
  core.info(
    `Selected ${projects.length} projects across ${languages.size} languages | average quality: ${average === undefined ? "n/a" : average.toFixed(2)}`
  );

  return {
    candidates: unique.length,
    passedThreshold: filtered.passedThreshold.length,
    passedFilters: filtered.projects.length,
    relaxed: filtered.relaxed,
    projects,
  };
}
