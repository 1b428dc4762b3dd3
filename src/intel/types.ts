export interface NewsItem {
  /** Stable identifier: feed GUID, else link, else a hash of the title. */
  id: string;
  title: string;
  summary?: string;
  url?: string;
  source: string;
  publishedAt?: string;
  feedGroup?: string;
}
