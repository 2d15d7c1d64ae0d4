import { MS_PER_DAY, utcDate } from "../scoring/time.js";
import type { SearchCriteria } from "../config.js";

export type SearchParams = {
  q: string;
  sort: SearchCriteria["sort_by"];
  order: SearchCriteria["sort_order"];
  per_page: number;
};

function keywordClause(keywords: string[]): string | undefined {
  if (keywords.length === 0) return undefined;
  return keywords.map((k) => (k.includes(" ") ? `"${k}"` : k)).join(" OR ");
}

// A range needs a positive floor; 0..0 would match only starless repositories.
function starClause(criteria: SearchCriteria): string {
  if (criteria.star_range_multiplier !== undefined && criteria.min_stars > 0) {
    const max = Math.floor(criteria.min_stars * criteria.star_range_multiplier);
    return `stars:${criteria.min_stars}..${max}`;
  }
  return `stars:>=${criteria.min_stars}`;
}

function pushedClause(criteria: SearchCriteria, now: Date): string {
  const from = new Date(now.getTime() - criteria.update_within_days * MS_PER_DAY);
  return `pushed:${utcDate(from)}..${utcDate(now)}`;
}

// An explicit min_forks wins over the ratio of the star threshold.
function forkClause(criteria: SearchCriteria): string | undefined {
  if (criteria.min_forks !== undefined) return `forks:>=${criteria.min_forks}`;
  if (criteria.min_fork_ratio > 0) {
    return `forks:>=${Math.floor(criteria.min_stars * criteria.min_fork_ratio)}`;
  }
  return undefined;
}

/**
 * Builds the GitHub search qualifier string. Clause order is fixed so the
 * same criteria and instant always yield the same query.
 *
 * @example
 * buildSearchQuery({ keywords: ["ai", "llm"], min_stars: 100, ... }, now)
 * // "ai OR llm stars:>=100 pushed:2026-10-12..2026-10-19 forks:>=5 fork:false"
 */
export function buildSearchQuery(
  criteria: SearchCriteria,
  now: Date = new Date()
): string {
  const parts: Array<string | undefined> = [
    keywordClause(criteria.keywords),
    starClause(criteria),
    criteria.language ? `language:${criteria.language}` : undefined,
    pushedClause(criteria, now),
    forkClause(criteria),
    criteria.exclude_forks ? "fork:false" : undefined,
    criteria.good_first_issues ? "good-first-issues:>0" : undefined,
    criteria.min_topics !== undefined ? `topics:>=${criteria.min_topics}` : undefined,
    ...criteria.topics.map((topic) => `topic:${topic}`),
  ];

  return parts.filter((part): part is string => part !== undefined).join(" ");
}

export function buildSearchParams(
  criteria: SearchCriteria,
  now: Date = new Date()
): SearchParams {
  return {
    q: buildSearchQuery(criteria, now),
    sort: criteria.sort_by,
    order: criteria.sort_order,
    per_page: criteria.per_page,
  };
}
