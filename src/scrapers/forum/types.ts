export interface ThreadSummary {
  threadId: string;
  threadUrl: string;
  title: string;
  author: string;
  authorUrl: string;
  replies: number;
  views: number;
  rating: number;
  ratingCount: number;
  prefixes: string[];
}

export interface DownloadLink {
  platform: string;
  host: string;
  url: string;
}

export interface ThreadMetadata {
  threadUpdated?: string;
  releaseDate?: string;
  censored?: string;
  osPlatforms?: string;
  language?: string;
  genre?: string;
}

export interface GameRecord extends ThreadSummary, ThreadMetadata {
  version: string;
  developer: string;
  developerUrl?: string;
  categories: string[];
  tags: string[];
  content: string;
  overview?: string;
  changelog?: string;
  installation?: string;
  downloadLinks: DownloadLink[];
  images: string[];
  featuredImage?: string;
  useExternalImages: boolean;
}

export interface ListingParseOptions {
  baseUrl: string;
  ignoreThreadIds: ReadonlySet<string>;
}

export interface ThreadParseOptions {
  baseUrl: string;
  attachmentHost: string;
  imageProxyBase: string;
}
