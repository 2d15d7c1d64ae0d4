import * as core from "@actions/core";
import type { DigestConfig } from "./config.js";
import type { RankingOutcome } from "./ranking.js";
import type {
  AnalyzedProject,
  CandidateProject,
  ScoredProject,
} from "./sources/types.js";

export interface PipelineResult {
  candidatesFound: number;
  projectsSelected: number;
  relaxed: boolean;
  reportPath: string;
  emailSent: boolean;
}

export interface PipelineDeps {
  collect: (config: DigestConfig) => Promise<CandidateProject[]>;
  rank: (candidates: CandidateProject[], config: DigestConfig) => RankingOutcome;
  analyze: (
    projects: ScoredProject[],
    config: DigestConfig
  ) => Promise<AnalyzedProject[]>;
  report: (projects: AnalyzedProject[], config: DigestConfig) => Promise<string>;
  deliver: (
    reportPath: string,
    config: DigestConfig,
    dryRun: boolean
  ) => Promise<boolean>;
}

export async function runPipeline(
  config: DigestConfig,
  deps: PipelineDeps,
  dryRun: boolean
): Promise<PipelineResult> {
  core.info("Stage 1/5: Searching GitHub...");
  const candidates = await deps.collect(config);
  core.info(`  Found ${candidates.length} candidates`);

  core.info("Stage 2/5: Scoring and ranking...");
  const ranking = deps.rank(candidates, config);
  core.info(
    `  ${ranking.projects.length} projects selected${ranking.relaxed ? " (relaxed filters)" : ""}`
  );

  core.info("Stage 3/5: Analyzing projects...");
  const analyzed = await deps.analyze(ranking.projects, config);
  core.info(`  ${analyzed.length} projects analyzed`);

  core.info("Stage 4/5: Writing report...");
  const reportPath = await deps.report(analyzed, config);
  core.info(`  Report saved to ${reportPath}`);

  core.info("Stage 5/5: Delivering report...");
  const emailSent = await deps.deliver(reportPath, config, dryRun);
  core.info(`  ${emailSent ? "Email sent" : "Email not sent"}`);

  return {
    candidatesFound: candidates.length,
    projectsSelected: ranking.projects.length,
    relaxed: ranking.relaxed,
    reportPath,
    emailSent,
  };
}
