import { readFileSync } from "fs";
import { z } from "zod";

/** Narrative text for digests; swap in any source of prose. */
export interface ContentProvider {
  trend(period: string): string;
  insight(period: string): string;
  question(period: string): string;
}

const ContentSchema = z.object({
  trends: z.array(z.string()).min(1),
  insights: z.array(z.string()).min(1),
  questions: z.array(z.string()).min(1),
});
export type ContentLibrary = z.infer<typeof ContentSchema>;

const CONTENT_URL = new URL("../../data/content.json", import.meta.url);

export function loadContent(): ContentLibrary {
  return ContentSchema.parse(JSON.parse(readFileSync(CONTENT_URL, "utf8")));
}

function indexFor(key: string, size: number) {
  let h = 0;
  for (const ch of key) h = (h * 31 + ch.charCodeAt(0)) >>> 0;
  return h % size;
}

/** Picks one entry per period key, so a re-run of the same period repeats it. */
export class RotatingContentProvider implements ContentProvider {
  constructor(private readonly lib: ContentLibrary = loadContent()) {}

  trend(period: string) {
    return this.lib.trends[indexFor(`trend:${period}`, this.lib.trends.length)];
  }

  insight(period: string) {
    return this.lib.insights[
      indexFor(`insight:${period}`, this.lib.insights.length)
    ];
  }

  question(period: string) {
    return this.lib.questions[
      indexFor(`question:${period}`, this.lib.questions.length)
    ];
  }
}
