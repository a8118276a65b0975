// Ensure env is loaded before anything reads configuration
import { env, Env } from './config/env.config';

import { AxiosInstance } from 'axios';
import { Pool } from 'pg';
import { logger } from './config/logger.config';
import { closeRedis } from './config/redis.config';
import { closePool, createPool } from './db/pool';
import { SOURCE } from './domain/model/canonical.types';
import { COMPOSITE_PROVIDER_ID } from './integrations/composite/composite-provider';
import { ProviderSettings, SourceProviderFactory } from './integrations/provider-factory';
import { SourceProvider } from './integrations/shared/source-provider.interface';
import {
  AGGREGATOR_OPERATIONS,
  AggregatorOperation,
  LeagueDataAggregator,
  ProviderPriorities,
} from './modules/aggregator/aggregator.service';
import { DisambiguationService } from './modules/players/disambiguation.service';
import { CacheService, CacheStore } from './services/cache.service';
import { metrics, MetricsSnapshot } from './services/metrics.service';

export interface LeagueDataServices {
  providers: Record<string, SourceProvider>;
  aggregator: LeagueDataAggregator;
  disambiguation: DisambiguationService;
  /** Fetch, cache and fan-out counters gathered so far in this process */
  metrics(): MetricsSnapshot;
  /** Ends the connections this call opened */
  close(): Promise<void>;
}

export interface ServiceOverrides {
  pool?: Pool | null;
  cache?: CacheStore | null;
  http?: AxiosInstance;
}

export function settingsFromEnv(config: Env): ProviderSettings {
  return {
    cutoffYear: config.HISTORICAL_CUTOFF_YEAR,
    leagueSiteBaseUrl: config.LEAGUE_SITE_BASE_URL,
    leagueSiteMinDelayMs: config.LEAGUE_SITE_MIN_DELAY_MS,
    referenceSiteBaseUrl: config.REFERENCE_SITE_BASE_URL,
    referenceSiteMinDelayMs: config.REFERENCE_SITE_MIN_DELAY_MS,
    httpTimeoutMs: config.HTTP_TIMEOUT_MS,
    httpMaxRetries: config.HTTP_MAX_RETRIES,
    cacheTtlSeconds: config.CACHE_TTL_SECONDS,
  };
}

type PrioritySetting =
  | 'PROVIDER_PRIORITY_SEARCH'
  | 'PROVIDER_PRIORITY_STATS'
  | 'PROVIDER_PRIORITY_TEAMS'
  | 'PROVIDER_PRIORITY_ROSTER'
  | 'PROVIDER_PRIORITY_STANDINGS';

const PRIORITY_SETTINGS: Record<AggregatorOperation, PrioritySetting> = {
  search: 'PROVIDER_PRIORITY_SEARCH',
  stats: 'PROVIDER_PRIORITY_STATS',
  teams: 'PROVIDER_PRIORITY_TEAMS',
  roster: 'PROVIDER_PRIORITY_ROSTER',
  standings: 'PROVIDER_PRIORITY_STANDINGS',
};

/**
 * Configured priorities restricted to the providers that were wired. An
 * operation with no usable configured names keeps its default order.
 */
export function resolvePriorities(
  config: Env,
  defaults: ProviderPriorities,
  wired: readonly string[]
): ProviderPriorities {
  const resolved: ProviderPriorities = { ...defaults };
  for (const operation of AGGREGATOR_OPERATIONS) {
    const configured = config[PRIORITY_SETTINGS[operation]];
    if (!configured) continue;

    const usable = configured.filter((name) => wired.includes(name));
    const dropped = configured.filter((name) => !wired.includes(name));
    if (dropped.length > 0) {
      logger.warn('Ignoring providers that are not wired', { operation, providers: dropped });
    }
    if (usable.length > 0) resolved[operation] = usable;
  }
  return resolved;
}

/**
 * Composition root. With an archive configured, the archive and the league
 * site are served through the composite provider; without one the league
 * site stands alone. The reference site is always wired as the secondary
 * source.
 */
export function createLeagueDataServices(
  config: Env = env,
  overrides: ServiceOverrides = {}
): LeagueDataServices {
  const ownsPool = overrides.pool === undefined && !!config.DATABASE_URL;
  const pool = overrides.pool !== undefined ? overrides.pool : ownsPool ? createPool(config.DATABASE_URL) : null;

  const ownsCache = overrides.cache === undefined && !!config.REDIS_HOST;
  const cache = overrides.cache !== undefined ? overrides.cache : ownsCache ? new CacheService() : null;

  const factory = new SourceProviderFactory(settingsFromEnv(config), { pool, cache, http: overrides.http });
  const primary = factory.hasHistoricalArchive ? COMPOSITE_PROVIDER_ID : SOURCE.LEAGUE_SITE;

  const providers: Record<string, SourceProvider> = {
    [primary]: factory.createProvider(factory.hasHistoricalArchive ? 'composite' : 'league_site'),
    [SOURCE.REFERENCE_SITE]: factory.createProvider('reference_site'),
  };

  const defaults: ProviderPriorities = {
    search: [primary, SOURCE.REFERENCE_SITE],
    stats: [primary, SOURCE.REFERENCE_SITE],
    teams: [primary],
    roster: [primary],
    standings: [primary],
  };
  const aggregator = new LeagueDataAggregator(
    providers,
    resolvePriorities(config, defaults, Object.keys(providers))
  );

  logger.info('League data services ready', {
    providers: Object.keys(providers),
    archive: factory.hasHistoricalArchive,
    cache: cache !== null,
  });

  return {
    providers,
    aggregator,
    disambiguation: new DisambiguationService(aggregator),
    metrics: () => metrics.snapshot(),
    async close() {
      if (ownsPool && pool) await closePool(pool);
      if (ownsCache) await closeRedis();
    },
  };
}
