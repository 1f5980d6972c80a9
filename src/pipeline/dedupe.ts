import { createHash } from "crypto";
import type { SignalStore } from "../db/store.js";
import type { RawArticle } from "../types.js";

const normalize = (s: string) => s.toLowerCase().replace(/\s+/g, " ").trim();

/** Article ledger gate: each title+source pair is admitted once. */
export class Deduplicator {
  constructor(private readonly store: Pick<SignalStore, "insertArticleIfAbsent" | "hasArticle">) {}

  articleId(x: Pick<RawArticle, "title" | "source">) {
    return createHash("sha256")
      .update(`${normalize(x.title)}|${normalize(x.source)}`)
      .digest("hex");
  }

  seen(x: Pick<RawArticle, "title" | "source">) {
    return this.store.hasArticle(this.articleId(x));
  }

  /** Records the article; returns its id on first sighting, null afterwards. */
  admit(x: RawArticle): string | null {
    const id = this.articleId(x);
    const fresh = this.store.insertArticleIfAbsent({
      id,
      title: x.title,
      source: x.source,
      link: x.link,
      publishedDate: x.publishedAt,
      processed: true,
    });
    return fresh ? id : null;
  }
}
