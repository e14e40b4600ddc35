import { describe, it, expect } from "vitest";
import {
  tokenize,
  skillText,
  SkillVocabulary,
  MinMaxScaler,
  FeatureVocabulary,
} from "../src/vocabulary.ts";
import { NotFittedError, EmptyCorpusError } from "../src/utils/errors.ts";
import { makeFreelancer } from "./helpers.ts";

describe("tokenize", () => {
  it("lowercases and joins skills before splitting", () => {
    expect(skillText(["Machine Learning", "SQL"])).toBe("machine learning sql");
    expect(tokenize(skillText(["Machine Learning", "SQL"]))).toEqual(["machine", "learning", "sql"]);
  });

  it("splits on punctuation and drops one-character tokens", () => {
    expect(tokenize("node.js c++ ui/ux")).toEqual(["node", "js", "ui", "ux"]);
  });

  it("returns empty for no skills", () => {
    expect(tokenize("")).toEqual([]);
  });
});

describe("SkillVocabulary", () => {
  const docs = [
    ["Python", "SQL"],
    ["Python", "React"],
    ["React", "CSS"],
  ];

  it("builds a sorted vocabulary", () => {
    const vocab = new SkillVocabulary();
    vocab.fit(docs);
    expect(vocab.terms()).toEqual(["css", "python", "react", "sql"]);
    expect(vocab.size).toBe(4);
  });

  it("weights rare skills above common ones", () => {
    const vocab = new SkillVocabulary();
    vocab.fit(docs);
    // python appears in 2 of 3 docs, sql in 1
    expect(vocab.idfOf("python")).toBeCloseTo(Math.log(4 / 3) + 1, 12);
    expect(vocab.idfOf("sql")).toBeCloseTo(Math.log(2) + 1, 12);
    expect(vocab.idfOf("sql")).toBeGreaterThan(vocab.idfOf("python") ?? Infinity);
    expect(vocab.idfOf("rust")).toBeUndefined();
  });

  it("produces unit-length vectors", () => {
    const vocab = new SkillVocabulary();
    vocab.fit(docs);
    expect(vocab.transform(["Python", "Python"])).toEqual([0, 1, 0, 0]);
    const v = vocab.transform(["Python", "SQL"]);
    expect(Math.hypot(...v)).toBeCloseTo(1, 12);
  });

  it("returns a zero vector for unknown skills", () => {
    const vocab = new SkillVocabulary();
    vocab.fit(docs);
    expect(vocab.transform(["Rust"])).toEqual([0, 0, 0, 0]);
  });

  it("throws NotFittedError before fit", () => {
    const vocab = new SkillVocabulary();
    expect(() => vocab.transform(["Python"])).toThrow(NotFittedError);
    expect(() => vocab.terms()).toThrow(NotFittedError);
  });

  it("rejects an empty corpus", () => {
    expect(() => new SkillVocabulary().fit([])).toThrow(EmptyCorpusError);
  });

  it("replaces the vocabulary on refit", () => {
    const vocab = new SkillVocabulary();
    vocab.fit(docs);
    vocab.fit([["Go"], ["Docker"]]);
    expect(vocab.terms()).toEqual(["docker", "go"]);
  });
});

describe("MinMaxScaler", () => {
  it("maps the corpus min to 0 and max to 1", () => {
    const scaler = new MinMaxScaler();
    scaler.fit([20, 10, 50]);
    expect(scaler.transform(10)).toBe(0);
    expect(scaler.transform(50)).toBe(1);
    expect(scaler.transform(20)).toBe(0.25);
    expect(scaler.bounds()).toEqual({ min: 10, max: 50 });
  });

  it("is monotonic", () => {
    const scaler = new MinMaxScaler();
    scaler.fit([15, 150, 42, 88]);
    const inputs = [0, 15, 20, 42, 60, 88, 120, 150, 300];
    const outputs = inputs.map((x) => scaler.transform(x));
    for (let i = 1; i < outputs.length; i++) {
      expect(outputs[i]).toBeGreaterThanOrEqual(outputs[i - 1]);
    }
  });

  it("clips values outside the fitted range", () => {
    const scaler = new MinMaxScaler();
    scaler.fit([10, 50]);
    expect(scaler.transform(5)).toBe(0);
    expect(scaler.transform(100)).toBe(1);
  });

  it("maps everything to 0 for a zero-width range", () => {
    const scaler = new MinMaxScaler();
    scaler.fit([3, 3, 3]);
    expect(scaler.transform(3)).toBe(0);
    expect(scaler.transform(7)).toBe(0);
  });

  it("throws NotFittedError before fit", () => {
    expect(() => new MinMaxScaler("rate scaler").transform(1)).toThrow(
      "rate scaler must be fitted before use"
    );
  });
});

describe("FeatureVocabulary", () => {
  it("fits skills and all three scalers from one corpus", () => {
    const vocab = new FeatureVocabulary();
    expect(vocab.isFitted).toBe(false);
    vocab.fit([
      makeFreelancer({ id: "a", skills: ["Go"], hourlyRate: 20, experienceYears: 1, avgRating: 3 }),
      makeFreelancer({ id: "b", skills: ["Rust"], hourlyRate: 60, experienceYears: 11, avgRating: 5 }),
    ]);
    expect(vocab.isFitted).toBe(true);
    expect(vocab.skillTerms()).toEqual(["go", "rust"]);
    expect(vocab.rate.bounds()).toEqual({ min: 20, max: 60 });
    expect(vocab.experience.bounds()).toEqual({ min: 1, max: 11 });
    expect(vocab.rating.bounds()).toEqual({ min: 3, max: 5 });
  });

  it("rejects an empty corpus", () => {
    expect(() => new FeatureVocabulary().fit([])).toThrow(EmptyCorpusError);
  });
});
