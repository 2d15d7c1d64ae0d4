import { describe, it, expect, vi } from "vitest";
import {
  applyPredicates,
  applyQualityThreshold,
  filterProjects,
  resolveFilterPolicy,
  type FilterPolicy,
} from "../../src/filter/pipeline.js";
import { PROFILES } from "../../src/scoring/profiles.js";
import { NOW, daysAgo, makeCandidate, makeConfig } from "../helpers.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
}));

const basePolicy: FilterPolicy = {
  profile: PROFILES.established,
  minScore: 60,
  minSurvivors: 3,
  order: "score",
  strict: [{ field: "topic_count", op: "gte", value: 2 }],
  relaxed: [{ field: "description_length", op: "present" }],
};

const strong = makeCandidate({ name: "acme/strong", url: "https://github.com/acme/strong" });
const fresher = makeCandidate({
  name: "acme/fresher",
  url: "https://github.com/acme/fresher",
  stars: 5000,
  pushedAt: daysAgo(1),
});
const weak = makeCandidate({
  name: "acme/weak",
  url: "https://github.com/acme/weak",
  stars: 0,
  forks: 0,
  topics: [],
  description: null,
  createdAt: daysAgo(1),
  pushedAt: daysAgo(365),
});

describe("applyQualityThreshold", () => {
  it("keeps candidates at or above the threshold with rounded scores", () => {
    const result = applyQualityThreshold([weak, strong], basePolicy, NOW);

    expect(result).toHaveLength(1);
    expect(result[0].name).toBe("acme/strong");
    expect(result[0].qualityScore).toBe(83.65);
  });

  it("does not mutate the input candidates", () => {
    applyQualityThreshold([strong], basePolicy, NOW);
    expect("qualityScore" in strong).toBe(false);
  });

  it("sorts by score by default", () => {
    const result = applyQualityThreshold([fresher, strong], basePolicy, NOW);
    expect(result.map((p) => p.name)).toEqual(["acme/strong", "acme/fresher"]);
    expect(result[1].qualityScore).toBe(69.31);
  });

  it("sorts by push time first when ordered by recency", () => {
    const result = applyQualityThreshold(
      [strong, fresher],
      { ...basePolicy, order: "recency" },
      NOW
    );
    expect(result.map((p) => p.name)).toEqual(["acme/fresher", "acme/strong"]);
  });

  it("returns an empty list for empty input", () => {
    expect(applyQualityThreshold([], basePolicy, NOW)).toEqual([]);
  });
});

describe("applyPredicates", () => {
  it("only ever removes items", () => {
    const input = [strong, fresher, weak];
    const result = applyPredicates(input, [{ field: "stars", op: "gte", value: 6000 }], NOW);
    expect(result).toEqual([strong]);
  });
});

describe("filterProjects", () => {
  const policy: FilterPolicy = { ...basePolicy, minScore: 0 };
  const twoTopics = makeCandidate({ name: "a/two", url: "https://github.com/a/two", topics: ["x", "y"] });
  const threeTopics = makeCandidate({ name: "a/three", url: "https://github.com/a/three" });
  const noTopics = makeCandidate({ name: "a/none", url: "https://github.com/a/none", topics: [] });
  const noDescription = makeCandidate({
    name: "a/bare",
    url: "https://github.com/a/bare",
    topics: [],
    description: null,
  });

  it("keeps the strict result when enough projects survive", () => {
    const extra = makeCandidate({ name: "a/extra", url: "https://github.com/a/extra" });
    const result = filterProjects(
      [twoTopics, threeTopics, extra, noTopics],
      policy,
      NOW
    );

    expect(result.relaxed).toBe(false);
    expect(result.projects.map((p) => p.name).sort()).toEqual(["a/extra", "a/three", "a/two"]);
  });

  it("relaxes once when fewer than the minimum survive", () => {
    const result = filterProjects(
      [twoTopics, threeTopics, noTopics, noDescription],
      policy,
      NOW
    );

    expect(result.relaxed).toBe(true);
    expect(result.passedThreshold).toHaveLength(4);
    expect(result.projects.map((p) => p.name).sort()).toEqual(["a/none", "a/three", "a/two"]);
  });

  it("returns whatever the relaxed filters leave without throwing", () => {
    const result = filterProjects([noDescription], policy, NOW);

    expect(result.relaxed).toBe(true);
    expect(result.projects).toEqual([]);
  });

  it("handles an empty candidate list", () => {
    const result = filterProjects([], policy, NOW);
    expect(result.passedThreshold).toEqual([]);
    expect(result.projects).toEqual([]);
  });

  it("never grows the list through the stages", () => {
    const candidates = [twoTopics, threeTopics, noTopics, noDescription, weak];
    const result = filterProjects(candidates, { ...basePolicy, minSurvivors: 0 }, NOW);

    expect(result.projects.length).toBeLessThanOrEqual(result.passedThreshold.length);
    expect(result.passedThreshold.length).toBeLessThanOrEqual(candidates.length);
  });
});

describe("resolveFilterPolicy", () => {
  it("uses the profile defaults and appends the star floor to the relaxed set", () => {
    const policy = resolveFilterPolicy(makeConfig());

    expect(policy.profile.name).toBe("established");
    expect(policy.minScore).toBe(60);
    expect(policy.minSurvivors).toBe(3);
    expect(policy.strict).toEqual(PROFILES.established.strict);
    expect(policy.relaxed).toEqual([
      { field: "description_length", op: "present" },
      { field: "stars", op: "gte", value: 100 },
    ]);
  });

  it.each(Object.keys(PROFILES))(
    "keeps every strict survivor above the star floor under the relaxed %s filters",
    (name) => {
      const policy = resolveFilterPolicy(makeConfig({ scoring: { profile: name } }));
      const pool = [
        makeCandidate(),
        makeCandidate({ stars: 50, forks: 10 }),
        makeCandidate({ stars: 0, forks: 0 }),
        makeCandidate({ description: null }),
        makeCandidate({ topics: [] }),
        makeCandidate({ createdAt: daysAgo(5), pushedAt: daysAgo(400) }),
        makeCandidate({ description: "Short", forks: 2 }),
      ];

      const strictSurvivors = applyPredicates(pool, policy.strict, NOW).filter(
        (project) => project.stars >= 100
      );
      const relaxedSurvivors = applyPredicates(pool, policy.relaxed, NOW);

      expect(strictSurvivors.length).toBeGreaterThan(0);
      for (const project of strictSurvivors) {
        expect(relaxedSurvivors).toContain(project);
      }
    }
  );

  it("applies config overrides", () => {
    const policy = resolveFilterPolicy(
      makeConfig({
        scoring: { profile: "momentum" },
        filter: {
          min_score: 40,
          order: "recency",
          strict: [{ field: "forks", op: "gte", value: 10 }],
        },
      })
    );

    expect(policy.profile.name).toBe("momentum");
    expect(policy.minScore).toBe(40);
    expect(policy.order).toBe("recency");
    expect(policy.strict).toEqual([{ field: "forks", op: "gte", value: 10 }]);
  });
});
