import crypto from "node:crypto";
import path from "node:path";
import fs from "fs-extra";
import { XMLParser, XMLValidator } from "fast-xml-parser";

import { DiscoveryError, describeError } from "../shared/errors";
import { normalizePackageName } from "../shared/project";
import { fetchWithConditional, type FetchOptions } from "./fetch";
import type { FeedCacheEntry, FeedEntry } from "./types";

const PROJECT_LINK = /\/project\/([^/]+)(?:\/([^/]+))?\/?$/;

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (name) => name === "item",
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
}

function toIsoDate(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

function toFeedEntry(item: unknown): FeedEntry | null {
  if (!isRecord(item)) {
    return null;
  }
  const link = readText(item.link);
  const title = readText(item.title);
  if (!link) {
    return null;
  }

  const pathname = URL.canParse(link) ? new URL(link).pathname : link;
  const match = PROJECT_LINK.exec(pathname);
  const [titleName, titleVersion] = (title ?? "").split(/\s+/);
  const name = match?.[1] ?? titleName;
  if (!name) {
    return null;
  }

  const version = match ? match[2] : titleVersion;
  const publishedAt = toIsoDate(readText(item.pubDate));
  return {
    name,
    link,
    ...(version ? { version } : {}),
    ...(publishedAt ? { publishedAt } : {}),
  };
}

export function parseFeed(xml: string): FeedEntry[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new Error(`Invalid XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  const document: unknown = parser.parse(xml);
  if (!isRecord(document) || !isRecord(document.rss) || !isRecord(document.rss.channel)) {
    throw new Error("Document is not an RSS 2.0 feed");
  }

  const items = document.rss.channel.item;
  if (items === undefined) {
    return [];
  }
  if (!Array.isArray(items)) {
    throw new Error("RSS channel items are malformed");
  }

  return items.map(toFeedEntry).filter((entry): entry is FeedEntry => entry !== null);
}

export function mergeFeedEntries(feeds: FeedEntry[][]): FeedEntry[] {
  const byName = new Map<string, FeedEntry>();
  for (const entries of feeds) {
    for (const entry of entries) {
      const key = normalizePackageName(entry.name);
      if (!byName.has(key)) {
        byName.set(key, entry);
      }
    }
  }
  return Array.from(byName.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, entry]) => entry);
}

export function feedCachePath(cacheDir: string, url: string): string {
  const hash = crypto.createHash("sha1").update(url).digest("hex");
  return path.join(cacheDir, "feeds", `${hash}.json`);
}

async function readFeedCache(cachePath: string): Promise<FeedCacheEntry | null> {
  if (!(await fs.pathExists(cachePath))) {
    return null;
  }
  try {
    const cached: FeedCacheEntry = await fs.readJson(cachePath);
    return Array.isArray(cached.entries) ? cached : null;
  } catch (error) {
    console.warn(`⚠️  Ignoring unreadable feed cache ${cachePath}: ${describeError(error)}`);
    return null;
  }
}

export interface FetchFeedOptions extends FetchOptions {
  cacheDir: string;
  forceRefresh?: boolean;
  debug?: boolean;
}

export async function fetchFeed(url: string, options: FetchFeedOptions): Promise<FeedEntry[]> {
  const cachePath = feedCachePath(options.cacheDir, url);
  const cached = options.forceRefresh ? null : await readFeedCache(cachePath);

  const result = await fetchWithConditional(
    url,
    parseFeed,
    cached ? { data: cached.entries, etag: cached.etag, lastModified: cached.lastModified } : null,
    options
  ).catch((error: unknown) => {
    throw new DiscoveryError(`Feed ${url} unavailable: ${describeError(error)}`, { cause: error });
  });

  if (options.debug) {
    console.log(`[feed] ${url}: ${result.data.length} entries (${result.source})`);
  }

  if (result.source === "network") {
    const entry: FeedCacheEntry = {
      url,
      fetchedAt: new Date().toISOString(),
      etag: result.etag,
      lastModified: result.lastModified,
      entries: result.data,
    };
    await fs.outputJson(cachePath, entry, { spaces: 2 });
  }

  return result.data;
}

export async function collectFeedEntries(urls: string[], options: FetchFeedOptions): Promise<FeedEntry[]> {
  const feeds: FeedEntry[][] = [];
  for (const url of urls) {
    feeds.push(await fetchFeed(url, options));
  }
  return mergeFeedEntries(feeds);
}
