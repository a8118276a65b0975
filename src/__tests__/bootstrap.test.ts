import axios from 'axios';
import { Pool } from 'pg';
import { createLeagueDataServices, resolvePriorities, settingsFromEnv } from '../bootstrap';
import { logger } from '../config/logger.config';
import { parseEnv } from '../config/env.config';
import { CompositeProvider } from '../integrations/composite/composite-provider';
import { LeagueSiteProvider } from '../integrations/league-site/league-site-provider';
import { CachedSourceProvider } from '../integrations/shared/cached-provider';
import { ReferenceSiteProvider } from '../integrations/reference-site/reference-site-provider';
import { ProviderPriorities } from '../modules/aggregator/aggregator.service';
import { CacheStore } from '../services/cache.service';

jest.mock('../config/logger.config', () => ({
  logger: { warn: jest.fn(), info: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

const defaults: ProviderPriorities = {
  search: ['composite', 'reference_site'],
  stats: ['composite', 'reference_site'],
  teams: ['composite'],
  roster: ['composite'],
  standings: ['composite'],
};

describe('resolvePriorities', () => {
  it('keeps the defaults when nothing is configured', () => {
    expect(resolvePriorities(parseEnv({}), defaults, ['composite', 'reference_site'])).toEqual(defaults);
  });

  it('takes the configured order for the wired providers', () => {
    const config = parseEnv({ PROVIDER_PRIORITY_STATS: 'reference_site,composite' });

    const resolved = resolvePriorities(config, defaults, ['composite', 'reference_site']);

    expect(resolved.stats).toEqual(['reference_site', 'composite']);
    expect(resolved.search).toEqual(defaults.search);
  });

  it('drops names that are not wired and warns about them', () => {
    const config = parseEnv({ PROVIDER_PRIORITY_SEARCH: 'historical,reference_site' });

    const resolved = resolvePriorities(config, defaults, ['composite', 'reference_site']);

    expect(resolved.search).toEqual(['reference_site']);
    expect(logger.warn).toHaveBeenCalledWith('Ignoring providers that are not wired', {
      operation: 'search',
      providers: ['historical'],
    });
  });

  it('falls back to the default when no configured name is wired', () => {
    const config = parseEnv({ PROVIDER_PRIORITY_TEAMS: 'historical' });

    expect(resolvePriorities(config, defaults, ['composite']).teams).toEqual(['composite']);
  });
});

describe('settingsFromEnv', () => {
  it('maps configuration onto provider settings', () => {
    const config = parseEnv({ HISTORICAL_CUTOFF_YEAR: '2008', HTTP_MAX_RETRIES: '0' });

    expect(settingsFromEnv(config)).toEqual({
      cutoffYear: 2008,
      leagueSiteBaseUrl: 'https://npb.jp',
      leagueSiteMinDelayMs: 500,
      referenceSiteBaseUrl: 'https://www.baseball-reference.com',
      referenceSiteMinDelayMs: 3000,
      httpTimeoutMs: 30000,
      httpMaxRetries: 0,
      cacheTtlSeconds: 86400,
    });
  });
});

describe('createLeagueDataServices', () => {
  const http = axios.create();

  it('serves the league site alone without an archive', async () => {
    const services = createLeagueDataServices(parseEnv({}), { pool: null, cache: null, http });

    expect(Object.keys(services.providers)).toEqual(['league_site', 'reference_site']);
    expect(services.providers.league_site).toBeInstanceOf(LeagueSiteProvider);
    expect(services.providers.reference_site).toBeInstanceOf(ReferenceSiteProvider);
    expect(services.aggregator.getPriority('stats')).toEqual(['league_site', 'reference_site']);
    expect(services.aggregator.getPriority('standings')).toEqual(['league_site']);

    await expect(services.close()).resolves.toBeUndefined();
  });

  it('serves the archive through the composite provider when a pool is supplied', () => {
    const pool = { query: jest.fn() } as unknown as Pool;

    const services = createLeagueDataServices(parseEnv({}), { pool, cache: null, http });

    expect(Object.keys(services.providers)).toEqual(['composite', 'reference_site']);
    expect(services.providers.composite).toBeInstanceOf(CompositeProvider);
    expect(services.aggregator.getPriority('search')).toEqual(['composite', 'reference_site']);
  });

  it('wraps the scraping providers in the cache when one is supplied', () => {
    const cache: CacheStore = { get: jest.fn(), set: jest.fn() };

    const services = createLeagueDataServices(parseEnv({}), { pool: null, cache, http });

    expect(services.providers.league_site).toBeInstanceOf(CachedSourceProvider);
    expect(services.providers.reference_site).toBeInstanceOf(CachedSourceProvider);
  });
});
