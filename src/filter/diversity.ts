import { normalizeUrl } from "./dedup.js";
import type { ScoredProject } from "../sources/types.js";

export const UNKNOWN_LANGUAGE = "Unknown";

const byScore = (a: ScoredProject, b: ScoredProject): number =>
  b.qualityScore - a.qualityScore;

export function groupByLanguage(
  projects: ScoredProject[]
): Map<string, ScoredProject[]> {
  const groups = new Map<string, ScoredProject[]>();
  for (const project of projects) {
    const language = project.language ?? UNKNOWN_LANGUAGE;
    const group = groups.get(language);
    if (group) {
      group.push(project);
    } else {
      groups.set(language, [project]);
    }
  }
  return groups;
}

function totalStars(projects: ScoredProject[]): number {
  return projects.reduce((sum, project) => sum + project.stars, 0);
}

/**
 * Slots per language group. With no more groups than the target, every
 * group gets an equal floor share (at least one); the remainder is left to
 * the score-ordered top-up. Otherwise only the `target` groups with the
 * most total stars get a single slot.
 */
export function allocateSlots(
  groups: Map<string, ScoredProject[]>,
  target: number
): Map<string, number> {
  const slots = new Map<string, number>();
  if (groups.size === 0) return slots;

  if (groups.size <= target) {
    const share = Math.max(1, Math.floor(target / groups.size));
    for (const language of groups.keys()) slots.set(language, share);
    return slots;
  }

  const ranked = [...groups.entries()].sort(
    ([, a], [, b]) => totalStars(b) - totalStars(a)
  );
  ranked.forEach(([language], index) => {
    slots.set(language, index < target ? 1 : 0);
  });
  return slots;
}

/**
 * Spreads the selection across primary languages, preferring the highest
 * quality projects inside each group. The result holds at most `target`
 * distinct projects, sorted by quality score.
 */
export function ensureDiversity(
  projects: ScoredProject[],
  target: number
): ScoredProject[] {
  if (projects.length === 0 || target <= 0) return [];

  const groups = groupByLanguage(projects);
  const slots = allocateSlots(groups, target);
  const selected: ScoredProject[] = [];
  const selectedUrls = new Set<string>();

  const take = (project: ScoredProject): void => {
    const key = normalizeUrl(project.url);
    if (selectedUrls.has(key)) return;
    selectedUrls.add(key);
    selected.push(project);
  };

  for (const [language, count] of slots) {
    if (count === 0) continue;
    const group = groups.get(language) ?? [];
    [...group].sort(byScore).slice(0, count).forEach(take);
  }

  const remaining = [...projects].sort(byScore);
  for (const project of remaining) {
    if (selected.length >= target) break;
    take(project);
  }

  return selected.sort(byScore).slice(0, target);
}
