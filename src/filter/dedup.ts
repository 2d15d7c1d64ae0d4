import * as core from "@actions/core";
import type { CandidateProject } from "../sources/types.js";

export function normalizeUrl(url: string): string {
  return url.replace(/\/+$/, "").toLowerCase();
}

/** Keeps the first occurrence of each repository URL (case-insensitive). */
export function dedup<T extends CandidateProject>(candidates: T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const candidate of candidates) {
    const key = normalizeUrl(candidate.url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(candidate);
  }

  if (unique.length < candidates.length) {
    core.info(`Dedup: ${candidates.length} → ${unique.length} candidates`);
  }
  return unique;
}
