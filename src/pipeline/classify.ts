// src/pipeline/classify.ts
import type { PolicyConfig } from "../policy.js";
import { HOUR_MS } from "../policy.js";
import type { RawArticle, SignalDraft, SignalType } from "../types.js";
import { loadVocabulary, termRx, type Vocabulary } from "./vocabulary.js";

export const CATEGORY_LABEL: Record<SignalType, string> = {
  acquisition: "Acquisition",
  ipo: "IPO",
  funding: "Funding",
  innovation: "Innovation",
  product_launch: "Product launch",
  general: "General",
};

const PREDICTION: Record<SignalType, string> = {
  acquisition: "Consolidation move likely to draw competitor responses",
  ipo: "Public-market debut likely to reprice comparable private companies",
  funding: "Fresh capital points to hiring and expansion news in the coming weeks",
  innovation: "Technical advance could open a new product line or licensing deal",
  product_launch:
    "Launch likely to be followed by early customer and pricing announcements",
  general: "Notable startup activity worth monitoring",
};

const MAX_EVIDENCE_KEYWORDS = 5;
/** Clock skew tolerated on feed publish dates. */
const FUTURE_SKEW_MS = 5 * 60_000;

const round4 = (x: number) => Math.round(x * 10_000) / 10_000;

/** Articles outside the recency window are never offered to the classifier. */
export function isFresh(
  article: Pick<RawArticle, "publishedAt">,
  now: Date,
  recencyHours: number
): boolean {
  const published = Date.parse(article.publishedAt);
  if (Number.isNaN(published)) return false;
  const age = now.getTime() - published;
  return age >= -FUTURE_SKEW_MS && age <= recencyHours * HOUR_MS;
}

export function articleText(article: Pick<RawArticle, "title" | "description">) {
  return `${article.title.trim()}\n${article.description.trim()}`.trim();
}

type Term = { term: string; rx: RegExp };

/** Lexical scorer: keyword count × weight plus a single first-match category bonus. */
export class Classifier {
  private readonly terms: Term[];
  private readonly categories: { type: SignalType; bonus: number; rx: RegExp[] }[];
  private readonly generalBonus: number;

  constructor(
    private readonly policy: PolicyConfig,
    vocabulary: Vocabulary = loadVocabulary()
  ) {
    const all = [
      ...vocabulary.keywords,
      ...vocabulary.categories.flatMap((c) => c.triggers),
    ].map((t) => t.toLowerCase());
    this.terms = [...new Set(all)].map((term) => ({ term, rx: termRx(term) }));
    this.categories = vocabulary.categories.map((c) => ({
      type: c.type,
      bonus: c.bonus,
      rx: c.triggers.map(termRx),
    }));
    this.generalBonus = vocabulary.generalBonus;
  }

  /** Matched vocabulary entries, in vocabulary order. */
  matchKeywords(text: string): string[] {
    const x = text.toLowerCase();
    return this.terms.filter((t) => t.rx.test(x)).map((t) => t.term);
  }

  /** First category in priority order with any trigger present. */
  detectCategory(text: string): { type: SignalType; bonus: number } {
    const x = text.toLowerCase();
    const hit = this.categories.find((c) => c.rx.some((rx) => rx.test(x)));
    return hit
      ? { type: hit.type, bonus: hit.bonus }
      : { type: "general", bonus: this.generalBonus };
  }

  score(text: string) {
    const matched = this.matchKeywords(text);
    const category = this.detectCategory(text);
    const raw = matched.length * this.policy.perKeywordWeight + category.bonus;
    return { matched, category, confidence: Math.min(1, round4(raw)) };
  }

  classify(article: RawArticle, now: Date = new Date()): SignalDraft | null {
    const content = articleText(article);
    const { matched, category, confidence } = this.score(content);
    if (confidence < this.policy.minConfidence) return null;

    const source = article.source.trim() || "unknown";
    return {
      signalType: category.type,
      source,
      title: article.title.trim(),
      link: article.link,
      content,
      confidence,
      detectedAt: now.toISOString(),
      prediction: `${PREDICTION[category.type]} (${matched.length} indicators via ${source}).`,
      evidence: [
        `Reported by ${source}`,
        ...matched.slice(0, MAX_EVIDENCE_KEYWORDS).map((k) => `Mentions "${k}"`),
        `Category: ${CATEGORY_LABEL[category.type]}`,
      ],
      matchedKeywords: matched,
      articleId: null,
    };
  }
}
