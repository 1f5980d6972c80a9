import { readFileSync } from "fs";
import { z } from "zod";
import { SIGNAL_TYPES } from "../types.js";

const VocabularySchema = z.object({
  keywords: z.array(z.string().min(1)),
  categories: z.array(
    z.object({
      type: z.enum(SIGNAL_TYPES).exclude(["general"]),
      bonus: z.number().min(0).max(1),
      triggers: z.array(z.string().min(1)).min(1),
    })
  ),
  generalBonus: z.number().min(0).max(1),
  premiumOnly: z.array(z.string().min(1)),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

const VOCABULARY_URL = new URL("../../data/vocabulary.json", import.meta.url);

let cached: Vocabulary | undefined;

/** Keyword vocabulary, category priority list and premium-only terms. */
export function loadVocabulary(): Vocabulary {
  cached ??= VocabularySchema.parse(
    JSON.parse(readFileSync(VOCABULARY_URL, "utf8"))
  );
  return cached;
}

const escapeRx = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Whole-word / whole-phrase matcher; spaces in a phrase match any whitespace. */
export function termRx(term: string): RegExp {
  const body = escapeRx(term.toLowerCase()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`);
}
