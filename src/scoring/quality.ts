import { daysSince } from "./time.js";
import type { ScoringProfile } from "./profiles.js";
import type { CandidateProject } from "../sources/types.js";

// Horizons past which a maturity component earns its full weight.
const MATURE_AGE_DAYS = 730;
const COMPLETE_TOPIC_COUNT = 5;
const COMPLETE_DESCRIPTION_LENGTH = 100;

// An issue ratio this far from the ideal scores zero maintenance.
const ISSUE_RATIO_TOLERANCE = 0.2;

export interface ScoreBreakdown {
  recency: number;
  popularity: number;
  maintenance: number;
  maturity: number;
  total: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function ratio(value: number, horizon: number): number {
  return Math.min(value / horizon, 1);
}

function recencyScore(
  project: CandidateProject,
  profile: ScoringProfile,
  now: Date
): number {
  const { weight, windowDays } = profile.recency;
  const days = daysSince(project.pushedAt, now);
  return clamp(weight * (1 - ratio(days, windowDays)), 0, weight);
}

function popularityScore(
  project: CandidateProject,
  profile: ScoringProfile
): number {
  const policy = profile.popularity;
  if (project.stars <= 0) return 0;

  const raw =
    policy.mode === "fork_ratio"
      ? policy.weight * Math.min((2 * project.forks) / project.stars, 1)
      : policy.weight * (project.stars / policy.referenceStars);
  return clamp(raw, 0, policy.weight);
}

// Penalizes both neglected (too few issues) and overloaded (too many)
// trackers relative to the star count.
function maintenanceScore(
  project: CandidateProject,
  profile: ScoringProfile
): number {
  const { weight, idealIssueRatio } = profile.maintenance;
  if (project.stars <= 0) return 0;

  const issueRatio = project.openIssues / project.stars;
  const distance = Math.abs(issueRatio - idealIssueRatio);
  return clamp(weight * (1 - ratio(distance, ISSUE_RATIO_TOLERANCE)), 0, weight);
}

function maturityScore(
  project: CandidateProject,
  profile: ScoringProfile,
  now: Date
): number {
  const policy = profile.maturity;

  if (policy.mode === "size") {
    return clamp(
      policy.weight * ratio(project.size, policy.referenceSizeKb),
      0,
      policy.weight
    );
  }

  const age = clamp(
    policy.ageWeight * ratio(daysSince(project.createdAt, now), MATURE_AGE_DAYS),
    0,
    policy.ageWeight
  );
  const topics = clamp(
    policy.topicWeight * ratio(project.topics.length, COMPLETE_TOPIC_COUNT),
    0,
    policy.topicWeight
  );
  const description = clamp(
    policy.descriptionWeight *
      ratio((project.description ?? "").length, COMPLETE_DESCRIPTION_LENGTH),
    0,
    policy.descriptionWeight
  );
  return age + topics + description;
}

export function scoreBreakdown(
  project: CandidateProject,
  profile: ScoringProfile,
  now: Date = new Date()
): ScoreBreakdown {
  const recency = recencyScore(project, profile, now);
  const popularity = popularityScore(project, profile);
  const maintenance = maintenanceScore(project, profile);
  const maturity = maturityScore(project, profile, now);

  return {
    recency,
    popularity,
    maintenance,
    maturity,
    total: clamp(recency + popularity + maintenance + maturity, 0, 100),
  };
}

/** Heuristic quality of one repository, between 0 and 100 inclusive. */
export function scoreProject(
  project: CandidateProject,
  profile: ScoringProfile,
  now: Date = new Date()
): number {
  return scoreBreakdown(project, profile, now).total;
}
