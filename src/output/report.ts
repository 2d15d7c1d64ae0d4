import * as core from "@actions/core";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { averageScore } from "../ranking.js";
import type { DigestConfig } from "../config.js";
import type { AnalyzedProject } from "../sources/types.js";

const NO_DESCRIPTION = "No description provided";
const UNKNOWN = "Unknown";

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** "2026-10-19 08:05 UTC" */
function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`
  );
}

function reportFileName(date: Date): string {
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`;
  return `oss-digest-${stamp}.md`;
}

function buildProjectSection(project: AnalyzedProject): string {
  const rows: Array<[string, string]> = [
    ["URL", project.url],
    ["Stars", String(project.stars)],
    ["Forks", String(project.forks)],
    ["Language", project.language ?? UNKNOWN],
    ["Quality Score", `${project.qualityScore.toFixed(2)}/100`],
  ];

  const lines = [
    `## ${project.name}`,
    ``,
    `| Field | Value |`,
    `| --- | --- |`,
    ...rows.map(([field, value]) => `| **${field}** | ${escapeTableCell(value)} |`),
    ``,
    `### Description`,
    ``,
    project.description?.trim() || NO_DESCRIPTION,
    ``,
    `### Analysis`,
    ``,
    project.analysis.trim() || "No analysis available",
  ];
  return lines.join("\n");
}

export function buildReport(
  projects: AnalyzedProject[],
  title: string,
  generatedAt: Date
): string {
  const header = [`# ${title}`, ``, `_Generated ${formatTimestamp(generatedAt)}_`, ``];

  if (projects.length === 0) {
    header.push(`No projects met the selection criteria in this run.`);
    return header.join("\n") + "\n";
  }

  const average = averageScore(projects) ?? 0;
  header.push(
    `${projects.length} projects selected | average quality score: ${average.toFixed(2)}`
  );

  const sections = projects.map(buildProjectSection);
  return [header.join("\n"), ...sections].join("\n\n---\n\n") + "\n";
}

export interface ReportWriter {
  mkdir(dir: string): Promise<unknown>;
  writeFile(path: string, content: string): Promise<void>;
}

const fsWriter: ReportWriter = {
  mkdir: (dir) => mkdir(dir, { recursive: true }),
  writeFile: (path, content) => writeFile(path, content, "utf-8"),
};

/** Renders the digest and writes it under `report.output_dir`; returns the path. */
export async function writeReport(
  projects: AnalyzedProject[],
  config: DigestConfig,
  now: Date = new Date(),
  writer: ReportWriter = fsWriter
): Promise<string> {
  const path = join(config.report.output_dir, reportFileName(now));

  await writer.mkdir(config.report.output_dir);
  await writer.writeFile(path, buildReport(projects, config.report.title, now));

  core.info(`Report written to ${path} (${projects.length} projects)`);
  return path;
}

export { buildProjectSection, escapeTableCell, formatTimestamp, reportFileName };
