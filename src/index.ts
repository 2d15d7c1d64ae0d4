import * as core from "@actions/core";
import { analyzeProjects } from "./analyzer/llm.js";
import { loadConfig } from "./config.js";
import { RateLimitError } from "./errors.js";
import { deliverReport } from "./output/email.js";
import { writeReport } from "./output/report.js";
import { runPipeline } from "./pipeline.js";
import { rankCandidates } from "./ranking.js";
import { collectGitHub } from "./sources/github.js";

async function run(): Promise<void> {
  try {
    const configPath = core.getInput("config_path") || "digest.config.yml";
    const dryRun = core.getInput("dry_run") === "true";

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);

    const result = await runPipeline(
      config,
      {
        collect: (c) => collectGitHub(c),
        rank: (candidates, c) => rankCandidates(candidates, c),
        analyze: (projects, c) => analyzeProjects(projects, c),
        report: (projects, c) => writeReport(projects, c),
        deliver: deliverReport,
      },
      dryRun
    );

    core.setOutput("candidates_found", result.candidatesFound);
    core.setOutput("projects_selected", result.projectsSelected);
    core.setOutput("report_path", result.reportPath);
  } catch (error) {
    if (error instanceof RateLimitError) {
      core.setFailed(`${error.message}. Re-run the workflow after the reset time.`);
    } else if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
