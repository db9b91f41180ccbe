import type { Logger } from 'pino';
import { z } from 'zod';
import type { NewsArticle, NewsFeed } from '../../domain/index.js';
import { requestJson } from '../http.js';

export interface HttpNewsFeedOptions {
  baseUrl: string;
  apiKey: string | undefined;
  log: Logger;
  pageSize?: number;
  timeoutMs?: number;
}

const newsResponseSchema = z.object({
  status: z.string(),
  totalResults: z.number().int().optional(),
  articles: z.array(z.object({
    source: z.object({ name: z.string().nullish() }).nullish(),
    title: z.string(),
    url: z.string(),
    description: z.string().nullish(),
    publishedAt: z.string().nullish(),
  })).default([]),
});

/** Keyword search over a NewsAPI-compatible `/v2/everything` endpoint. */
export class HttpNewsFeed implements NewsFeed {
  constructor(private readonly options: HttpNewsFeedOptions) {}

  async getArticles(keywords: string): Promise<NewsArticle[]> {
    if (!this.options.apiKey) {
      throw new Error('NEWS_API_KEY is not configured');
    }

    const url = new URL('/v2/everything', this.options.baseUrl);
    url.searchParams.set('q', keywords);
    url.searchParams.set('language', 'en');
    url.searchParams.set('pageSize', String(this.options.pageSize ?? 20));
    url.searchParams.set('apiKey', this.options.apiKey);

    const body = newsResponseSchema.parse(
      await requestJson('news', url, { timeoutMs: this.options.timeoutMs }),
    );
    this.options.log.debug({ keywords, count: body.articles.length }, 'Fetched news articles');

    return body.articles.map((article) => ({
      title: article.title,
      source: article.source?.name ?? null,
      url: article.url,
      description: article.description ?? null,
      published_at: article.publishedAt ?? null,
    }));
  }
}
