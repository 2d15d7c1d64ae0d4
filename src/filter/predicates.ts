import { z } from "zod";
import { daysSince } from "../scoring/time.js";
import type { CandidateProject } from "../sources/types.js";

export const PREDICATE_FIELDS = [
  "description_length",
  "topic_count",
  "fork_ratio",
  "issue_ratio",
  "age_days",
  "staleness_days",
  "stars",
  "forks",
  "open_issues",
  "size",
] as const;

export type PredicateField = (typeof PREDICATE_FIELDS)[number];

const ComparisonSpecSchema = z.object({
  field: z.enum(PREDICATE_FIELDS),
  op: z.enum(["gt", "gte", "lt", "lte", "eq"]),
  value: z.number(),
});

const PresenceSpecSchema = z.object({
  field: z.enum(PREDICATE_FIELDS),
  op: z.literal("present"),
});

export const PredicateSpecSchema = z.union([
  ComparisonSpecSchema,
  PresenceSpecSchema,
]);

export type PredicateSpec = z.infer<typeof PredicateSpecSchema>;

const OP_SYMBOLS = {
  gt: ">",
  gte: ">=",
  lt: "<",
  lte: "<=",
  eq: "==",
} as const;

/**
 * Resolves a predicate field for one project. Returns undefined when the
 * field has no meaningful value: a null description has no length, and the
 * star ratios are undefined for a repository without stars.
 */
export function fieldValue(
  project: CandidateProject,
  field: PredicateField,
  now: Date
): number | undefined {
  switch (field) {
    case "description_length":
      return project.description === null ? undefined : project.description.length;
    case "topic_count":
      return project.topics.length;
    case "fork_ratio":
      return project.stars > 0 ? project.forks / project.stars : undefined;
    case "issue_ratio":
      return project.stars > 0 ? project.openIssues / project.stars : undefined;
    case "age_days":
      return daysSince(project.createdAt, now);
    case "staleness_days":
      return daysSince(project.pushedAt, now);
    case "stars":
      return project.stars;
    case "forks":
      return project.forks;
    case "open_issues":
      return project.openIssues;
    case "size":
      return project.size;
  }
}

export function matchesPredicate(
  project: CandidateProject,
  spec: PredicateSpec,
  now: Date
): boolean {
  const value = fieldValue(project, spec.field, now);
  if (value === undefined) return false;
  if (spec.op === "present") return true;

  switch (spec.op) {
    case "gt":
      return value > spec.value;
    case "gte":
      return value >= spec.value;
    case "lt":
      return value < spec.value;
    case "lte":
      return value <= spec.value;
    case "eq":
      return value === spec.value;
  }
}

export function matchesAll(
  project: CandidateProject,
  specs: PredicateSpec[],
  now: Date
): boolean {
  return specs.every((spec) => matchesPredicate(project, spec, now));
}

export function describePredicate(spec: PredicateSpec): string {
  if (spec.op === "present") return `${spec.field} present`;
  return `${spec.field} ${OP_SYMBOLS[spec.op]} ${spec.value}`;
}
