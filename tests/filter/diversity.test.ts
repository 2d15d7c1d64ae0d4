import { describe, it, expect } from "vitest";
import {
  allocateSlots,
  ensureDiversity,
  groupByLanguage,
} from "../../src/filter/diversity.js";
import { makeScored } from "../helpers.js";

describe("groupByLanguage", () => {
  it("puts projects without a language in the Unknown group", () => {
    const groups = groupByLanguage([
      makeScored("a/py", 70, { language: "Python" }),
      makeScored("a/none", 65, { language: null }),
    ]);

    expect([...groups.keys()]).toEqual(["Python", "Unknown"]);
    expect(groups.get("Unknown")?.[0].name).toBe("a/none");
  });
});

describe("allocateSlots", () => {
  it("gives every group an equal floor share when groups fit", () => {
    const groups = groupByLanguage([
      makeScored("a/1", 90, { language: "Python" }),
      makeScored("a/2", 80, { language: "Go" }),
      makeScored("a/3", 70, { language: "Rust" }),
    ]);

    expect(Object.fromEntries(allocateSlots(groups, 7))).toEqual({
      Python: 2,
      Go: 2,
      Rust: 2,
    });
  });

  it("gives one slot to the most-starred groups when there are too many", () => {
    const groups = groupByLanguage([
      makeScored("a/1", 90, { language: "Python", stars: 100 }),
      makeScored("a/2", 80, { language: "Go", stars: 5000 }),
      makeScored("a/3", 70, { language: "Rust", stars: 3000 }),
    ]);

    expect(Object.fromEntries(allocateSlots(groups, 2))).toEqual({
      Python: 0,
      Go: 1,
      Rust: 1,
    });
  });
});

describe("ensureDiversity", () => {
  it("fills every slot from a single language by score", () => {
    const projects = Array.from({ length: 10 }, (_, i) =>
      makeScored(`py/p${i}`, 60 + i, { language: "Python" })
    );

    const result = ensureDiversity(projects, 5);

    expect(result.map((p) => p.name)).toEqual([
      "py/p9",
      "py/p8",
      "py/p7",
      "py/p6",
      "py/p5",
    ]);
  });

  it("covers every language when the target allows", () => {
    const projects = [
      makeScored("py/a", 95, { language: "Python" }),
      makeScored("py/b", 94, { language: "Python" }),
      makeScored("py/c", 93, { language: "Python" }),
      makeScored("go/a", 70, { language: "Go" }),
      makeScored("rs/a", 65, { language: "Rust" }),
    ];

    const result = ensureDiversity(projects, 3);

    expect(result.map((p) => p.name)).toEqual(["py/a", "go/a", "rs/a"]);
  });

  it("tops up leftover slots with the best remaining projects", () => {
    const projects = [
      makeScored("py/a", 95, { language: "Python" }),
      makeScored("py/b", 90, { language: "Python" }),
      makeScored("py/c", 85, { language: "Python" }),
      makeScored("go/a", 60, { language: "Go" }),
    ];

    // 2 groups, target 3: one slot each, then the best leftover
    const result = ensureDiversity(projects, 3);

    expect(result.map((p) => p.name)).toEqual(["py/a", "py/b", "go/a"]);
  });

  it("picks the most-starred languages when groups outnumber the target", () => {
    const projects = [
      makeScored("py/a", 95, { language: "Python", stars: 200 }),
      makeScored("go/a", 70, { language: "Go", stars: 9000 }),
      makeScored("rs/a", 80, { language: "Rust", stars: 4000 }),
      makeScored("rs/b", 75, { language: "Rust", stars: 4000 }),
    ];

    const result = ensureDiversity(projects, 2);

    expect(result.map((p) => p.name)).toEqual(["rs/a", "go/a"]);
  });

  it("never emits the same url twice", () => {
    const projects = [
      makeScored("a/dup", 90, { language: "Python" }),
      makeScored("a/dup", 89, {
        language: "Go",
        url: "https://github.com/A/Dup",
      }),
      makeScored("a/other", 50, { language: "Go" }),
    ];

    const result = ensureDiversity(projects, 3);
    const urls = result.map((p) => p.url.toLowerCase());

    expect(new Set(urls).size).toBe(urls.length);
    expect(result).toHaveLength(2);
  });

  it("returns only input projects and at most target items", () => {
    const projects = Array.from({ length: 12 }, (_, i) =>
      makeScored(`x/p${i}`, 50 + ((i * 7) % 13), {
        language: ["Python", "Go", "Rust", null][i % 4],
        stars: 100 * (i + 1),
      })
    );

    const result = ensureDiversity(projects, 5);

    expect(result.length).toBeLessThanOrEqual(5);
    for (const project of result) {
      expect(projects).toContain(project);
    }
    expect(new Set(result.map((p) => p.language ?? "Unknown")).size).toBe(4);
  });

  it("handles empty input", () => {
    expect(ensureDiversity([], 5)).toEqual([]);
  });
});
