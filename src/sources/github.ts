import { Octokit } from "@octokit/rest";
import * as core from "@actions/core";
import { z } from "zod";
import { RateLimitError } from "../errors.js";
import { buildSearchParams, type SearchParams } from "./query.js";
import type { DigestConfig } from "../config.js";
import type { CandidateProject } from "./types.js";

/** The slice of Octokit the collector uses. */
export interface RepoSearchClient {
  search: {
    repos(params: SearchParams): Promise<{
      data: { total_count: number; incomplete_results: boolean; items: unknown[] };
    }>;
  };
}

// ISO-8601 with a zone (Z or ±hh:mm); anything else counts as malformed.
const timestamp = z.string().datetime({ offset: true });

const SearchItemSchema = z.object({
  full_name: z.string().min(1),
  html_url: z.string().url(),
  description: z.string().nullable(),
  language: z.string().nullable().optional(),
  stargazers_count: z.number().int().nonnegative(),
  forks_count: z.number().int().nonnegative(),
  open_issues_count: z.number().int().nonnegative(),
  size: z.number().nonnegative(),
  topics: z.array(z.string()).optional(),
  created_at: timestamp,
  pushed_at: timestamp,
});

function toCandidate(item: z.infer<typeof SearchItemSchema>): CandidateProject {
  return {
    name: item.full_name,
    url: item.html_url,
    description: item.description,
    language: item.language ?? null,
    stars: item.stargazers_count,
    forks: item.forks_count,
    openIssues: item.open_issues_count,
    size: item.size,
    topics: item.topics ?? [],
    createdAt: item.created_at,
    pushedAt: item.pushed_at,
  };
}

function itemLabel(item: unknown): string {
  if (typeof item === "object" && item !== null && "full_name" in item) {
    return String(item.full_name);
  }
  return "<unnamed>";
}

/** Validates each raw search item, skipping (and logging) malformed ones. */
export function mapSearchItems(items: unknown[]): CandidateProject[] {
  const candidates: CandidateProject[] = [];

  for (const item of items) {
    const parsed = SearchItemSchema.safeParse(item);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
      core.warning(`Skipping malformed search result ${itemLabel(item)} (${fields})`);
      continue;
    }
    candidates.push(toCandidate(parsed.data));
  }

  return candidates;
}

type HeaderValue = string | number | undefined;

interface HttpError {
  status: number;
  message: string;
  response?: { headers?: Record<string, HeaderValue> };
}

function isHttpError(error: unknown): error is HttpError {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function headerNumber(value: HeaderValue): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Recognizes GitHub's quota responses: 429, or 403 with an exhausted
 * remaining count or a rate-limit message.
 */
export function toRateLimitError(error: unknown): RateLimitError | undefined {
  if (!isHttpError(error)) return undefined;

  const headers = error.response?.headers ?? {};
  const exhausted = headerNumber(headers["x-ratelimit-remaining"]) === 0;
  const limited =
    error.status === 429 ||
    (error.status === 403 &&
      (exhausted || /rate limit/i.test(error.message)));
  if (!limited) return undefined;

  const reset = headerNumber(headers["x-ratelimit-reset"]);
  return new RateLimitError(reset === undefined ? undefined : new Date(reset * 1000));
}

async function searchRepositories(
  client: RepoSearchClient,
  params: SearchParams
) {
  try {
    return await client.search.repos(params);
  } catch (error) {
    const rateLimited = toRateLimitError(error);
    if (rateLimited) {
      core.error(rateLimited.message);
      throw rateLimited;
    }
    throw error;
  }
}

// One page of candidates per run; there is no pagination.
export async function collectGitHub(
  config: DigestConfig,
  client?: RepoSearchClient,
  now: Date = new Date()
): Promise<CandidateProject[]> {
  const octokit: RepoSearchClient =
    client ?? new Octokit({ auth: core.getInput("github_token") });
  const params = buildSearchParams(config.search, now);

  core.info(`GitHub search query: ${params.q}`);
  core.debug(`GitHub search params: ${JSON.stringify(params)}`);

  const { data } = await searchRepositories(octokit, params);
  if (data.incomplete_results) {
    core.warning("GitHub search returned incomplete results");
  }

  const candidates = mapSearchItems(data.items);
  core.info(
    `GitHub search returned ${data.items.length} of ${data.total_count} repositories (${candidates.length} usable)`
  );
  return candidates;
}
