import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { TransientIOError } from "../errors.js";
import type { Article } from "../types.js";
import { JsonFeed, type NewsFeed } from "./feed-source.js";

export type NewsCategory = "politics" | "crypto";

export const DEFAULT_RSS_FEEDS: Record<NewsCategory, string[]> = {
  politics: ["https://feeds.npr.org/1001/rss.xml", "https://rss.politico.com/politics-news.xml"],
  crypto: ["https://cointelegraph.com/rss", "https://decrypt.co/feed"],
};

const CATEGORY_ALIASES: Record<string, NewsCategory> = {
  politics: "politics",
  rss_politics: "politics",
  crypto: "crypto",
  rss_crypto: "crypto",
};

/** Categories named in config; unknown names are ignored, none at all means every category. */
export function resolveCategories(names: readonly string[]): NewsCategory[] {
  const resolved: NewsCategory[] = [];
  for (const name of names) {
    const category = CATEGORY_ALIASES[name.trim().toLowerCase()];
    if (category && !resolved.includes(category)) resolved.push(category);
  }
  return resolved.length > 0 ? resolved : ["politics", "crypto"];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

// Text nodes come back as strings, numbers, or { "#text" } when the tag has attributes
const textSchema = z
  .union([z.string(), z.number(), z.object({ "#text": z.union([z.string(), z.number()]).optional() })])
  .optional();

type Text = z.infer<typeof textSchema>;

const atomLinkSchema = z.object({
  "@_href": z.string().optional(),
  "@_rel": z.string().optional(),
});

const rssItemSchema = z.object({
  title: textSchema,
  link: textSchema,
  description: textSchema,
  pubDate: textSchema,
  "dc:date": textSchema,
});

const atomEntrySchema = z.object({
  title: textSchema,
  link: z.union([atomLinkSchema, z.array(atomLinkSchema)]).optional(),
  summary: textSchema,
  content: textSchema,
  published: textSchema,
  updated: textSchema,
});

const documentSchema = z.object({
  rss: z
    .object({
      channel: z.object({ title: textSchema, item: z.array(rssItemSchema).default([]) }),
    })
    .optional(),
  feed: z.object({ title: textSchema, entry: z.array(atomEntrySchema).default([]) }).optional(),
});

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  htmlEntities: true,
  isArray: (name) => name === "item" || name === "entry",
});

function textOf(value: Text): string {
  if (value === undefined) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return value["#text"] === undefined ? "" : String(value["#text"]).trim();
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, " ").replace(/\s+/g, " ").trim();
}

function parseDate(value: string): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function atomHref(link: z.infer<typeof atomEntrySchema>["link"]): string {
  const links = link === undefined ? [] : Array.isArray(link) ? link : [link];
  const preferred = links.find((l) => !l["@_rel"] || l["@_rel"] === "alternate") ?? links[0];
  return preferred?.["@_href"]?.trim() ?? "";
}

interface Entry {
  headline: string;
  url: string;
  summary: string;
  publishedAt: Date | null;
}

function toArticles(entries: Entry[], source: string, category?: string): Article[] {
  const articles: Article[] = [];
  for (const e of entries) {
    if (!e.headline || !e.url || !e.publishedAt) continue;
    articles.push({ headline: e.headline, summary: e.summary, source, url: e.url, publishedAt: e.publishedAt, category });
  }
  return articles;
}

/** Parses an RSS 2.0 or Atom document. Entries without a title, link or date are skipped. */
export function parseRssFeed(xml: string, fallbackSource: string, category?: string): Article[] {
  const doc = documentSchema.parse(parser.parse(xml));

  if (doc.rss) {
    const { channel } = doc.rss;
    const entries = channel.item.map((item) => ({
      headline: textOf(item.title),
      url: textOf(item.link),
      summary: stripTags(textOf(item.description)),
      publishedAt: parseDate(textOf(item.pubDate) || textOf(item["dc:date"])),
    }));
    return toArticles(entries, textOf(channel.title) || fallbackSource, category);
  }

  if (doc.feed) {
    const { feed } = doc;
    const entries = feed.entry.map((entry) => ({
      headline: textOf(entry.title),
      url: atomHref(entry.link),
      summary: stripTags(textOf(entry.summary) || textOf(entry.content)),
      publishedAt: parseDate(textOf(entry.published) || textOf(entry.updated)),
    }));
    return toArticles(entries, textOf(feed.title) || fallbackSource, category);
  }

  throw new Error(`${fallbackSource} is not an RSS or Atom document`);
}

export class RssFeed implements NewsFeed {
  readonly name: string;
  private url: string;
  private category?: string;

  constructor(url: string, category?: string) {
    this.url = url;
    this.name = url;
    this.category = category;
  }

  async fetchArticles(): Promise<Article[]> {
    const res = await fetch(this.url, {
      headers: { Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml" },
    });
    if (!res.ok) {
      throw new TransientIOError(`Feed ${this.url} returned ${res.status}`);
    }
    return parseRssFeed(await res.text(), this.url, this.category);
  }
}

/** Built-in feeds for the chosen categories, followed by any extra feed URLs. */
export function createFeeds(categories: readonly string[], extraUrls: readonly string[]): NewsFeed[] {
  const feeds: NewsFeed[] = [];
  for (const category of resolveCategories(categories)) {
    for (const url of DEFAULT_RSS_FEEDS[category]) feeds.push(new RssFeed(url, category));
  }
  for (const url of extraUrls) {
    feeds.push(url.endsWith(".json") ? new JsonFeed(url) : new RssFeed(url));
  }
  return feeds;
}
