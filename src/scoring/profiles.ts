import type { PredicateSpec } from "../filter/predicates.js";

export const PROFILE_NAMES = ["momentum", "established"] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

/**
 * `fork_ratio` reads forks/stars as a growth-potential signal;
 * `stars` rewards raw popularity against a reference star count.
 */
export type PopularityPolicy =
  | { mode: "fork_ratio"; weight: number }
  | { mode: "stars"; weight: number; referenceStars: number };

export type MaturityPolicy =
  | {
      mode: "composite";
      ageWeight: number;
      topicWeight: number;
      descriptionWeight: number;
    }
  | { mode: "size"; weight: number; referenceSizeKb: number };

export interface ScoringProfile {
  name: string;
  recency: { weight: number; windowDays: number };
  popularity: PopularityPolicy;
  maintenance: { weight: number; idealIssueRatio: number };
  maturity: MaturityPolicy;
  minScore: number;
  strict: PredicateSpec[];
  relaxed: PredicateSpec[];
}

const COMPOSITE_MATURITY: MaturityPolicy = {
  mode: "composite",
  ageWeight: 10,
  topicWeight: 5,
  descriptionWeight: 5,
};

// The stars >= min_stars rule of the relaxed set comes from the search
// criteria, see resolveFilterPolicy.
const RELAXED: PredicateSpec[] = [{ field: "description_length", op: "present" }];

export const PROFILES: Record<ProfileName, ScoringProfile> = {
  // Short-horizon profile for weekly "what's moving" digests.
  momentum: {
    name: "momentum",
    recency: { weight: 35, windowDays: 7 },
    popularity: { mode: "fork_ratio", weight: 25 },
    maintenance: { weight: 20, idealIssueRatio: 0.1 },
    maturity: COMPOSITE_MATURITY,
    minScore: 60,
    strict: [
      { field: "description_length", op: "gt", value: 30 },
      { field: "topic_count", op: "gte", value: 1 },
      { field: "fork_ratio", op: "gte", value: 0.05 },
    ],
    relaxed: RELAXED,
  },
  established: {
    name: "established",
    recency: { weight: 30, windowDays: 180 },
    popularity: { mode: "stars", weight: 30, referenceStars: 10_000 },
    maintenance: { weight: 20, idealIssueRatio: 0.1 },
    maturity: COMPOSITE_MATURITY,
    minScore: 60,
    strict: [
      { field: "description_length", op: "gt", value: 30 },
      { field: "topic_count", op: "gte", value: 1 },
      { field: "fork_ratio", op: "gte", value: 0.05 },
      { field: "age_days", op: "gte", value: 30 },
      { field: "staleness_days", op: "lte", value: 180 },
    ],
    relaxed: RELAXED,
  },
};

export function getProfile(name: ProfileName): ScoringProfile {
  return PROFILES[name];
}
