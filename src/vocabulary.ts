import { NotFittedError, EmptyCorpusError } from "./utils/errors.ts";
import type { Freelancer } from "./utils/types.ts";

// ── Skill text ───────────────────────────────────────────────────────

const TOKEN_PATTERN = /\b\w\w+\b/g;

export function skillText(skills: readonly string[]): string {
  return skills.join(" ").toLowerCase();
}

/**
 * Splits skill text into vocabulary tokens: runs of two or more word
 * characters. "Node.js" yields ["node", "js"]; "C++" yields nothing.
 */
export function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

// ── TF-IDF skill vocabulary ──────────────────────────────────────────

interface VocabularyState {
  terms: string[];
  index: Map<string, number>;
  idf: number[];
}

export class SkillVocabulary {
  private state: VocabularyState | null = null;

  get isFitted(): boolean {
    return this.state !== null;
  }

  get size(): number {
    return this.state?.terms.length ?? 0;
  }

  /**
   * Builds the vocabulary from one skill list per document. Replaces any
   * previous fit.
   */
  fit(documents: readonly (readonly string[])[]): void {
    if (documents.length === 0) throw new EmptyCorpusError();

    const docFreq = new Map<string, number>();
    for (const skills of documents) {
      for (const token of new Set(tokenize(skillText(skills)))) {
        docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
      }
    }

    const terms = [...docFreq.keys()].sort();
    const n = documents.length;
    // Smoothed idf: as if one extra document contained every term once
    const idf = terms.map((t) => Math.log((1 + n) / (1 + (docFreq.get(t) ?? 0))) + 1);

    this.state = {
      terms,
      index: new Map(terms.map((t, i) => [t, i])),
      idf,
    };
  }

  /** L2-normalized TF-IDF vector in the fitted term space. */
  transform(skills: readonly string[]): number[] {
    const state = this.requireState();
    const vector: number[] = new Array(state.terms.length).fill(0);

    for (const token of tokenize(skillText(skills))) {
      const i = state.index.get(token);
      if (i !== undefined) vector[i] += 1;
    }

    let sumSquares = 0;
    for (let i = 0; i < vector.length; i++) {
      vector[i] *= state.idf[i];
      sumSquares += vector[i] * vector[i];
    }

    if (sumSquares === 0) return vector;
    const norm = Math.sqrt(sumSquares);
    return vector.map((v) => v / norm);
  }

  terms(): string[] {
    return [...this.requireState().terms];
  }

  idfOf(term: string): number | undefined {
    const state = this.requireState();
    const i = state.index.get(term);
    return i === undefined ? undefined : state.idf[i];
  }

  private requireState(): VocabularyState {
    if (!this.state) throw new NotFittedError("SkillVocabulary");
    return this.state;
  }
}

// ── Min-max scaler ───────────────────────────────────────────────────

export class MinMaxScaler {
  private range: { min: number; max: number } | null = null;

  constructor(private readonly name: string = "MinMaxScaler") {}

  get isFitted(): boolean {
    return this.range !== null;
  }

  fit(values: readonly number[]): void {
    if (values.length === 0) throw new EmptyCorpusError();
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
      if (v < min) min = v;
      if (v > max) max = v;
    }
    this.range = { min, max };
  }

  /**
   * Maps the fitted min to 0 and max to 1. Values outside the fitted range
   * are clipped. A zero-width range maps everything to 0.
   */
  transform(value: number): number {
    if (!this.range) throw new NotFittedError(this.name);
    const { min, max } = this.range;
    const span = max - min;
    if (span === 0) return 0;
    const scaled = (value - min) / span;
    return Math.min(1, Math.max(0, scaled));
  }

  bounds(): { min: number; max: number } {
    if (!this.range) throw new NotFittedError(this.name);
    return { ...this.range };
  }
}

// ── Combined vocabulary + scalers ────────────────────────────────────

/**
 * Everything fitted from the freelancer corpus: the skill vocabulary and one
 * scaler per numeric attribute. All four are fitted from the same corpus in
 * a single call.
 */
export class FeatureVocabulary {
  readonly skills = new SkillVocabulary();
  readonly rate = new MinMaxScaler("rate scaler");
  readonly experience = new MinMaxScaler("experience scaler");
  readonly rating = new MinMaxScaler("rating scaler");

  get isFitted(): boolean {
    return this.skills.isFitted;
  }

  fit(freelancers: readonly Freelancer[]): void {
    if (freelancers.length === 0) throw new EmptyCorpusError();

    this.skills.fit(freelancers.map((f) => f.skills));
    this.rate.fit(freelancers.map((f) => f.hourlyRate));
    this.experience.fit(freelancers.map((f) => f.experienceYears));
    this.rating.fit(freelancers.map((f) => f.avgRating));
  }

  skillTerms(): string[] {
    return this.skills.terms();
  }
}
