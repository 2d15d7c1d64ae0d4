import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { PredicateSpecSchema } from "./filter/predicates.js";
import { PROFILE_NAMES } from "./scoring/profiles.js";

// Workflow inputs arrive as strings; an empty one means "not set".
const optionalText = z.preprocess(
  (value) => (value === "" || value === null ? undefined : value),
  z.string().optional()
);

// Accepts either a YAML list or a comma-separated string ("ai, llm").
const KeywordsSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (typeof value === "string" ? value.split(",") : value)
      .map((keyword) => keyword.trim())
      .filter((keyword) => keyword.length > 0)
  );

const SearchSchema = z.object({
  keywords: KeywordsSchema.default([]),
  min_stars: z.number().int().nonnegative(),
  star_range_multiplier: z.number().min(1).optional(),
  language: optionalText,
  max_results: z.number().int().positive(),
  per_page: z.number().int().min(1).max(100).default(100),
  update_within_days: z.number().int().positive(),
  min_forks: z.number().int().nonnegative().optional(),
  min_fork_ratio: z.number().nonnegative().default(0.05),
  exclude_forks: z.boolean().default(true),
  sort_by: z
    .enum(["stars", "forks", "help-wanted-issues", "updated"])
    .default("updated"),
  sort_order: z.enum(["asc", "desc"]).default("desc"),
  topics: z.array(z.string().min(1)).default([]),
  min_topics: z.number().int().positive().optional(),
  good_first_issues: z.boolean().default(false),
});

const ScoringSchema = z.object({
  profile: z.enum(PROFILE_NAMES).default("established"),
});

const FilterSchema = z.object({
  min_score: z.number().min(0).max(100).optional(),
  min_survivors: z.number().int().nonnegative().default(3),
  order: z.enum(["score", "recency"]).default("score"),
  strict: z.array(PredicateSpecSchema).optional(),
  // Taken as given: it is not checked to be looser than `strict`. The
  // stars >= min_stars rule is still appended.
  relaxed: z.array(PredicateSpecSchema).optional(),
});

const DiversitySchema = z.object({
  target: z.number().int().positive().optional(),
});

const AnalysisSchema = z.object({
  model: z.string().default("claude-sonnet-4-6"),
  max_tokens: z.number().int().positive().default(1024),
  language: z.string().min(1).default("English"),
});

const ReportSchema = z.object({
  title: z.string().min(1).default("Open-Source Project Digest"),
  output_dir: z.string().min(1).default("reports"),
});

const EmailSchema = z.object({
  smtp_host: z.string().min(1),
  smtp_port: z.number().int().positive().default(465),
  sender: z.string().email(),
  recipients: z.array(z.string().email()).min(1),
  subject: z.string().min(1).default("Open-Source Project Digest"),
  max_attempts: z.number().int().positive().default(3),
  retry_delay_ms: z.number().int().nonnegative().default(5000),
});

export const DigestConfigSchema = z.object({
  search: SearchSchema,
  scoring: ScoringSchema.default({}),
  filter: FilterSchema.default({}),
  diversity: DiversitySchema.default({}),
  analysis: AnalysisSchema.default({}),
  report: ReportSchema.default({}),
  email: EmailSchema.optional(),
});

export type DigestConfig = z.infer<typeof DigestConfigSchema>;
export type SearchCriteria = DigestConfig["search"];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function parseConfig(yamlContent: string): DigestConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlContent);
  } catch (error) {
    throw new ConfigError(
      `Config is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = DigestConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", formatIssues(result.error));
  }
  return result.data;
}

export function loadConfig(filePath: string): DigestConfig {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Could not read config file "${filePath}": ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(content);
}
