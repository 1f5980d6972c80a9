import type { RawArticle } from "../types.js";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { FeedSource } from "./rss.js";

export type { FeedSource } from "./rss.js";
export { HttpFeedSource, parseFeed } from "./rss.js";

export interface PollResult {
  articles: RawArticle[];
  failedFeeds: string[];
}

/** Poll every feed with error isolation; results keep feed order. */
export async function pollAllFeeds(
  source: FeedSource,
  feedUrls: readonly string[]
): Promise<PollResult> {
  const results = await Promise.allSettled(feedUrls.map((u) => source.poll(u)));
  const out: PollResult = { articles: [], failedFeeds: [] };
  results.forEach((r, i) => {
    if (r.status === "fulfilled") out.articles.push(...r.value);
    else {
      out.failedFeeds.push(feedUrls[i]);
      log.warn("[FEED] poll error", {
        feed: feedUrls[i],
        err: errorMessage(r.reason),
      });
    }
  });
  return out;
}
