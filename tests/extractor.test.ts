import { describe, it, expect } from "vitest";
import { compileEntityRule, TextAnalyzer } from "../extractor.js";
import { defaultMemoryConfig } from "../config.js";

const analyzer = new TextAnalyzer(defaultMemoryConfig());

function summarize(text: string) {
  const result = analyzer.extract(text);
  return {
    entities: result.entities.map((e) => [e.surface, e.type]),
    relations: result.relations.map((r) => [r.subject, r.label, r.object]),
  };
}

describe("compileEntityRule", () => {
  it("should match vocabulary terms case-insensitively by default", () => {
    const rule = compileEntityRule({ name: "t", type: "TECH", kind: "vocabulary", terms: ["Python"] });
    expect(rule.match("I like python")).toEqual([{ start: 7, end: 13, surface: "python" }]);
  });

  it("should respect caseSensitive vocabularies", () => {
    const rule = compileEntityRule({
      name: "t",
      type: "ORGANIZATION",
      kind: "vocabulary",
      terms: ["Apple"],
      caseSensitive: true,
    });
    expect(rule.match("an apple from Apple")).toEqual([{ start: 14, end: 19, surface: "Apple" }]);
  });

  it("should not match a term inside a longer word", () => {
    const rule = compileEntityRule({ name: "t", type: "TECH", kind: "vocabulary", terms: ["AI", "Java"] });
    expect(rule.match("said JavaScript")).toEqual([]);
  });

  it("should prefer the longest vocabulary term", () => {
    const rule = compileEntityRule({
      name: "t",
      type: "TECH",
      kind: "vocabulary",
      terms: ["machine", "machine learning"],
    });
    expect(rule.match("machine learning").map((m) => m.surface)).toEqual(["machine learning"]);
  });

  it("should compile pattern rules with the global flag added", () => {
    const rule = compileEntityRule({ name: "p", type: "CONCEPT", kind: "pattern", pattern: "\\bfoo\\w*", flags: "i" });
    expect(rule.match("Foo food").map((m) => m.surface)).toEqual(["Foo", "food"]);
  });
});

describe("TextAnalyzer", () => {
  it("should extract the person, organization and works-at relation", () => {
    expect(summarize("John works at Google and specializes in AI research.")).toEqual({
      entities: [
        ["John", "PERSON"],
        ["Google", "ORGANIZATION"],
        ["AI", "TECH"],
        ["research", "CONCEPT"],
      ],
      relations: [["John", "WORKS_AT", "Google"]],
    });
  });

  it("should keep original surface text alongside the normalized form", () => {
    const [mountainView] = analyzer
      .extract("Offices in Mountain   View are big.")
      .entities.filter((e) => e.type === "LOCATION");
    expect(mountainView.surface).toBe("Mountain View");
    expect(mountainView.normalized).toBe("mountain view");
  });

  it("should resolve overlaps in favour of the earlier rule", () => {
    const { entities } = summarize("Google's AI research division is located in Mountain View, California.");
    expect(entities).toContainEqual(["Mountain View", "LOCATION"]);
    expect(entities).toContainEqual(["California", "LOCATION"]);
    expect(entities.filter(([, type]) => type === "PERSON")).toEqual([]);
  });

  it("should be deterministic", () => {
    const text = "The AI algorithm that John developed uses Python and TensorFlow for neural network training.";
    expect(analyzer.extract(text)).toEqual(analyzer.extract(text));
  });

  it("should collapse repeated mentions into the first occurrence", () => {
    const { entities } = analyzer.extract("Python is great. I love Python.");
    expect(entities).toHaveLength(1);
    expect(entities[0]).toMatchObject({ surface: "Python", type: "TECH", start: 0, occurrences: 2 });
  });

  it("should attach a context snippet to each entity", () => {
    const [john] = analyzer.extract("John works at Google and specializes in AI research.").entities;
    expect(john.context).toContain("works at Google");
  });

  it("should keep pronoun subjects literally", () => {
    expect(summarize("He created a new machine learning algorithm.").relations).toEqual([
      ["He", "CREATED", "machine learning"],
    ]);
  });

  it("should swap subject and object for inverse triggers", () => {
    expect(summarize("TensorFlow is a popular machine learning framework created by Google.").relations).toEqual([
      ["Google", "CREATED", "framework"],
    ]);
  });

  it("should look past an auxiliary verb for the subject", () => {
    expect(summarize("TensorFlow was created by Google.").relations).toEqual([
      ["Google", "CREATED", "TensorFlow"],
    ]);
  });

  it("should drop relation candidates without an entity or pronoun before the trigger", () => {
    expect(summarize("The team specializes in research.").relations).toEqual([]);
  });

  it("should produce no entities or relations for plain text", () => {
    expect(summarize("the weather was pleasant today")).toEqual({ entities: [], relations: [] });
  });

  it("should use a configured rule set", () => {
    const custom = new TextAnalyzer({
      entityRules: [
        { name: "people", type: "PERSON", kind: "vocabulary", terms: ["Alice"], caseSensitive: true },
        { name: "projects", type: "PROJECT", kind: "vocabulary", terms: ["Apollo"], caseSensitive: true },
        { name: "shadow", type: "CONCEPT", kind: "vocabulary", terms: ["Apollo"] },
      ],
      relationTemplates: [{ trigger: "maintains", label: "MAINTAINS" }],
      contextWindow: 5,
    });
    const result = custom.extract("Alice maintains Apollo.");
    expect(result.entities.map((e) => [e.surface, e.type])).toEqual([
      ["Alice", "PERSON"],
      ["Apollo", "PROJECT"],
    ]);
    expect(result.relations).toEqual([
      {
        subject: "Alice",
        label: "MAINTAINS",
        object: "Apollo",
        trigger: "maintains",
        start: 0,
        end: 22,
        context: "Alice maintains Apollo.",
      },
    ]);
  });
});
