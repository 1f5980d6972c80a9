// src/providers/rss.ts
import axios from "axios";
import * as cheerio from "cheerio";
import type { RawArticle } from "../types.js";

/** Feed collaborator: one poll returns the feed's current items, in feed order. */
export interface FeedSource {
  poll(feedUrl: string): Promise<RawArticle[]>;
}

const httpClient = axios.create({
  timeout: 10000,
  headers: {
    "User-Agent": "startup-signal-alerts/0.1",
    Accept: "application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8",
  },
  responseType: "text",
});

function hostname(url: string) {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return url;
  }
}

/** Descriptions often carry HTML; keep the text only. */
export function stripHtml(html: string) {
  if (!html) return "";
  return cheerio.load(html, null, false).text().replace(/\s+/g, " ").trim();
}

function toIso(raw: string) {
  const t = Date.parse(raw);
  return Number.isNaN(t) ? "" : new Date(t).toISOString();
}

/** RSS 2.0 <item> and Atom <entry> → RawArticle[]. */
export function parseFeed(xml: string, fallbackSource: string): RawArticle[] {
  const $ = cheerio.load(xml, { xml: true });
  const source =
    $("channel > title").first().text().trim() ||
    $("feed > title").first().text().trim() ||
    fallbackSource;
  const out: RawArticle[] = [];

  $("item").each((_, el) => {
    const $el = $(el);
    const title = $el.children("title").first().text().trim();
    const description = stripHtml(
      $el.children("description").first().text() ||
        $el.children("content\\:encoded").first().text()
    );
    if (!title && !description) return;
    out.push({
      title,
      description,
      link: $el.children("link").first().text().trim(),
      publishedAt: toIso(
        $el.children("pubDate").first().text().trim() ||
          $el.children("dc\\:date").first().text().trim()
      ),
      source,
    });
  });

  $("entry").each((_, el) => {
    const $el = $(el);
    const title = $el.children("title").first().text().trim();
    const description = stripHtml(
      $el.children("summary").first().text() ||
        $el.children("content").first().text()
    );
    if (!title && !description) return;
    const links = $el.children("link");
    const alternate = links.filter((_, l) => {
      const rel = $(l).attr("rel");
      return !rel || rel === "alternate";
    });
    out.push({
      title,
      description,
      link: (alternate.first().attr("href") ?? links.first().attr("href") ?? "").trim(),
      publishedAt: toIso(
        $el.children("published").first().text().trim() ||
          $el.children("updated").first().text().trim()
      ),
      source,
    });
  });

  return out;
}

export class HttpFeedSource implements FeedSource {
  async poll(feedUrl: string): Promise<RawArticle[]> {
    const { data } = await httpClient.get<string>(feedUrl);
    return parseFeed(String(data), hostname(feedUrl));
  }
}
