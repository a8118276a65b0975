export * from './domain';

export { SourceProvider } from './integrations/shared/source-provider.interface';
export * from './integrations/shared/source-provider.types';
export { HtmlPage, HtmlPageClient, PageSource, parseHtmlPage } from './integrations/shared/html-page.client';
export { RequestThrottle } from './integrations/shared/request-throttle';
export { CachedSourceProvider } from './integrations/shared/cached-provider';
export { HistoricalProvider } from './integrations/historical/historical-provider';
export { HistoricalRepository, HistoricalStore } from './integrations/historical/historical.repository';
export { LeagueSiteProvider } from './integrations/league-site/league-site-provider';
export { ReferenceSiteProvider } from './integrations/reference-site/reference-site-provider';
export { CompositeProvider } from './integrations/composite/composite-provider';
export { SourceProviderFactory, ProviderSettings, ProviderType } from './integrations/provider-factory';

export {
  LeagueDataAggregator,
  AggregatorOperation,
  ProviderPriorities,
  SearchOptions,
  PlayerStatsOptions,
} from './modules/aggregator/aggregator.service';
export { DisambiguationService, DisambiguationResult } from './modules/players/disambiguation.service';

export { CacheService, CacheStore, cacheKey } from './services/cache.service';
export { metrics, MetricsSnapshot } from './services/metrics.service';
export * from './utils/exceptions';

export { createLeagueDataServices, LeagueDataServices } from './bootstrap';
