import { AxiosInstance } from 'axios';
import { Pool } from 'pg';
import { logger } from '../config/logger.config';
import { SOURCE } from '../domain/model/canonical.types';
import { CacheStore } from '../services/cache.service';
import { ValidationException } from '../utils/exceptions';
import { CompositeProvider } from './composite/composite-provider';
import { HistoricalProvider } from './historical/historical-provider';
import { HistoricalRepository } from './historical/historical.repository';
import { LeagueSiteProvider } from './league-site/league-site-provider';
import { ReferenceSiteProvider } from './reference-site/reference-site-provider';
import { CachedSourceProvider } from './shared/cached-provider';
import { HtmlPageClient } from './shared/html-page.client';
import { RequestThrottle } from './shared/request-throttle';
import { SourceProvider } from './shared/source-provider.interface';

export type ProviderType = 'historical' | 'league_site' | 'reference_site' | 'composite';

export interface ProviderSettings {
  cutoffYear: number;
  leagueSiteBaseUrl: string;
  leagueSiteMinDelayMs: number;
  referenceSiteBaseUrl: string;
  referenceSiteMinDelayMs: number;
  httpTimeoutMs: number;
  httpMaxRetries: number;
  cacheTtlSeconds: number;
}

export interface ProviderDependencies {
  /** Historical archive; historical and composite providers need it */
  pool?: Pool | null;
  /** Response cache for the scraping providers */
  cache?: CacheStore | null;
  /** HTTP client shared by the page clients */
  http?: AxiosInstance;
}

/**
 * Factory for source provider instances
 *
 * Every call builds fresh instances: each scraping provider gets its own page
 * client and request throttle, so two providers never share a rate limit.
 */
export class SourceProviderFactory {
  constructor(
    private readonly settings: ProviderSettings,
    private readonly deps: ProviderDependencies = {}
  ) {}

  /**
   * Create a provider by type
   * @throws ValidationException when the historical archive is required but
   * no pool was supplied
   */
  createProvider(providerType: ProviderType): SourceProvider {
    logger.info(`Creating source provider: ${providerType}`);

    switch (providerType) {
      case 'historical':
        return new HistoricalProvider(new HistoricalRepository(this.requirePool(providerType)));

      case 'league_site':
        return this.withCache(
          new LeagueSiteProvider({
            pages: this.pageClient(SOURCE.LEAGUE_SITE, this.settings.leagueSiteMinDelayMs),
            baseUrl: this.settings.leagueSiteBaseUrl,
            cutoffYear: this.settings.cutoffYear,
          })
        );

      case 'reference_site':
        return this.withCache(
          new ReferenceSiteProvider({
            pages: this.pageClient(SOURCE.REFERENCE_SITE, this.settings.referenceSiteMinDelayMs),
            baseUrl: this.settings.referenceSiteBaseUrl,
          })
        );

      case 'composite':
        return new CompositeProvider({
          historical: this.createProvider('historical'),
          live: this.createProvider('league_site'),
          cutoffYear: this.settings.cutoffYear,
        });
    }
  }

  /** Whether the archive-backed providers can be built */
  get hasHistoricalArchive(): boolean {
    return !!this.deps.pool;
  }

  private pageClient(source: string, minDelayMs: number): HtmlPageClient {
    return new HtmlPageClient({
      source,
      throttle: new RequestThrottle(minDelayMs),
      timeoutMs: this.settings.httpTimeoutMs,
      maxRetries: this.settings.httpMaxRetries,
      http: this.deps.http,
    });
  }

  private withCache(provider: SourceProvider): SourceProvider {
    return this.deps.cache
      ? new CachedSourceProvider(provider, this.deps.cache, this.settings.cacheTtlSeconds)
      : provider;
  }

  private requirePool(providerType: ProviderType): Pool {
    if (!this.deps.pool) {
      throw new ValidationException(`The ${providerType} provider needs DATABASE_URL to be configured`);
    }
    return this.deps.pool;
  }
}
