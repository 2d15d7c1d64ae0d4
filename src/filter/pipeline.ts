import * as core from "@actions/core";
import { describePredicate, matchesAll, type PredicateSpec } from "./predicates.js";
import { getProfile, type ScoringProfile } from "../scoring/profiles.js";
import { scoreProject } from "../scoring/quality.js";
import type { DigestConfig } from "../config.js";
import type { CandidateProject, ScoredProject } from "../sources/types.js";

export type StageOrder = "score" | "recency";

export interface FilterPolicy {
  profile: ScoringProfile;
  minScore: number;
  minSurvivors: number;
  order: StageOrder;
  strict: PredicateSpec[];
  relaxed: PredicateSpec[];
}

export interface FilterResult {
  passedThreshold: ScoredProject[];
  projects: ScoredProject[];
  relaxed: boolean;
}

/**
 * Merges the selected profile with the config's overrides. The relaxed set
 * always keeps the configured star floor.
 */
export function resolveFilterPolicy(config: DigestConfig): FilterPolicy {
  const profile = getProfile(config.scoring.profile);
  const relaxed = config.filter.relaxed ?? profile.relaxed;

  return {
    profile,
    minScore: config.filter.min_score ?? profile.minScore,
    minSurvivors: config.filter.min_survivors,
    order: config.filter.order,
    strict: config.filter.strict ?? profile.strict,
    relaxed: [...relaxed, { field: "stars", op: "gte", value: config.search.min_stars }],
  };
}

function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

function compareProjects(order: StageOrder) {
  return (a: ScoredProject, b: ScoredProject): number => {
    if (order === "recency") {
      const pushed = Date.parse(b.pushedAt) - Date.parse(a.pushedAt);
      if (pushed !== 0) return pushed;
    }
    return b.qualityScore - a.qualityScore;
  };
}

/** Stage A: score every candidate and keep those at or above the threshold. */
export function applyQualityThreshold(
  candidates: CandidateProject[],
  policy: FilterPolicy,
  now: Date = new Date()
): ScoredProject[] {
  const scored: ScoredProject[] = [];

  for (const candidate of candidates) {
    const score = scoreProject(candidate, policy.profile, now);
    if (score >= policy.minScore) {
      scored.push({ ...candidate, qualityScore: roundScore(score) });
    }
  }

  return scored.sort(compareProjects(policy.order));
}

/** Stage B: keep projects that satisfy every predicate. */
export function applyPredicates<T extends CandidateProject>(
  projects: T[],
  specs: PredicateSpec[],
  now: Date = new Date()
): T[] {
  return projects.filter((project) => matchesAll(project, specs, now));
}

export function filterProjects(
  candidates: CandidateProject[],
  policy: FilterPolicy,
  now: Date = new Date()
): FilterResult {
  const passedThreshold = applyQualityThreshold(candidates, policy, now);
  core.info(
    `Quality threshold (>= ${policy.minScore}): ${candidates.length} → ${passedThreshold.length} projects`
  );

  const strict = applyPredicates(passedThreshold, policy.strict, now);
  core.info(
    `Strict filters [${policy.strict.map(describePredicate).join(", ")}]: ${passedThreshold.length} → ${strict.length} projects`
  );

  if (strict.length >= policy.minSurvivors) {
    return { passedThreshold, projects: strict, relaxed: false };
  }

  // One relaxation only, evaluated against the Stage A output.
  core.warning(
    `Only ${strict.length} projects passed strict filters (< ${policy.minSurvivors}); retrying with relaxed filters`
  );
  const relaxed = applyPredicates(passedThreshold, policy.relaxed, now);
  core.info(
    `Relaxed filters [${policy.relaxed.map(describePredicate).join(", ")}]: ${passedThreshold.length} → ${relaxed.length} projects`
  );

  return { passedThreshold, projects: relaxed, relaxed: true };
}
