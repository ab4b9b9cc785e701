export { YahooPriceProvider, barsFromChart } from './yahoo.price.provider.js';
export { YahooNewsProvider, DEFAULT_NEWS_LIMIT } from './yahoo.news.provider.js';
