/**
 * YAHOO NEWS PROVIDER
 * ===================
 *
 * Latest headlines for a symbol from the Yahoo Finance search API.
 */

import type { AxiosInstance } from 'axios';
import { RemoteServiceError } from '../../../common/errors.js';
import { toRemoteServiceError } from '../../../common/http.js';
import type { INewsProvider, NewsItem } from '../market-data.types.js';
import { YahooSearchResponseSchema } from './yahoo.chart.schema.js';

export const DEFAULT_NEWS_LIMIT = 3;

export class YahooNewsProvider implements INewsProvider {
  readonly id = 'yahoo';

  constructor(private readonly http: AxiosInstance) {}

  async fetchNews(symbol: string, limit = DEFAULT_NEWS_LIMIT): Promise<NewsItem[]> {
    let data: unknown;
    try {
      const response = await this.http.get('/v1/finance/search', {
        params: { q: symbol, quotesCount: 0, newsCount: limit },
      });
      data = response.data;
    } catch (error) {
      throw toRemoteServiceError('Yahoo news', error);
    }

    const parsed = YahooSearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteServiceError('Yahoo news', `malformed response for ${symbol}`);
    }

    return parsed.data.news.slice(0, limit).map((item) => ({
      title: item.title,
      link: item.link,
      publisher: item.publisher,
      publishedAt:
        item.providerPublishTime !== undefined
          ? new Date(item.providerPublishTime * 1000).toISOString()
          : undefined,
    }));
  }
}
