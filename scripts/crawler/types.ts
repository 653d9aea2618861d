import type { RepositoryLocation } from "../shared/project";

export const DEFAULT_FEEDS = ["https://pypi.org/rss/updates.xml", "https://pypi.org/rss/packages.xml"];

export interface FeedEntry {
  name: string;
  link: string;
  version?: string;
  publishedAt?: string;
}

export interface FeedCacheEntry {
  url: string;
  fetchedAt: string;
  etag?: string;
  lastModified?: string;
  entries: FeedEntry[];
}

export interface ProjectRecord {
  name: string;
  repositoryUrl?: string;
}

export type CrawlStatus = "cloned" | "updated" | "skipped" | "failed";

export interface CrawlResult {
  project: string;
  repository: string | null;
  status: CrawlStatus;
  reason?: string;
}

export interface RepositoryCheck {
  location: RepositoryLocation;
  defaultBranch: string;
}

export type RepositoryVerifier = (location: RepositoryLocation) => Promise<RepositoryCheck>;

export type RepositoryResolver = (packageName: string) => Promise<string | null>;
