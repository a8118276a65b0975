import { CachedSourceProvider } from '../../../integrations/shared/cached-provider';
import { SourceProvider } from '../../../integrations/shared/source-provider.interface';
import { NOT_FOUND } from '../../../integrations/shared/source-provider.types';
import { CacheStore } from '../../../services/cache.service';
import { metrics } from '../../../services/metrics.service';
import { TransportFailureException } from '../../../utils/exceptions';
import { makePlayer, makeProvider } from '../../fixtures/source-fixtures';

jest.mock('../../../config/logger.config', () => ({
  logger: { warn: jest.fn(), info: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

/** Stores JSON text, as the Redis-backed cache does. */
class MemoryCache implements CacheStore {
  readonly entries = new Map<string, string>();
  readonly ttls: number[] = [];

  async get<T>(key: string): Promise<T | null> {
    const raw = this.entries.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
    this.ttls.push(ttlSeconds);
  }
}

describe('CachedSourceProvider', () => {
  let inner: jest.Mocked<SourceProvider>;
  let cache: MemoryCache;
  let provider: CachedSourceProvider;

  beforeEach(() => {
    metrics.reset();
    inner = makeProvider('league_site');
    cache = new MemoryCache();
    provider = new CachedSourceProvider(inner, cache, 3600);
  });

  it('keeps the wrapped provider id', () => {
    expect(provider.providerId).toBe('league_site');
  });

  it('serves a repeated call from the cache', async () => {
    inner.searchPlayer.mockResolvedValue([makePlayer({ id: 'npb-1', source: 'league_site' })]);

    const first = await provider.searchPlayer('Yamada');
    const second = await provider.searchPlayer('Yamada');

    expect(second).toEqual(first);
    expect(inner.searchPlayer).toHaveBeenCalledTimes(1);
    expect(cache.ttls).toEqual([3600]);
    expect(metrics.counter('cache.league_site.miss')).toBe(1);
    expect(metrics.counter('cache.league_site.hit')).toBe(1);
  });

  it('keys on every argument', async () => {
    await provider.getPlayerStats('npb-1', { season: 2020, statsType: 'batting' });
    await provider.getPlayerStats('npb-1', { season: 2021, statsType: 'batting' });
    await provider.getPlayerStats('npb-1', { season: 2020, statsType: 'pitching' });

    expect(inner.getPlayerStats).toHaveBeenCalledTimes(3);
    expect(cache.entries.size).toBe(3);
  });

  it('keys a search on its season hint', async () => {
    await provider.searchPlayer('Yamada');
    await provider.searchPlayer('Yamada', { seasons: [2005, 2006] });
    await provider.searchPlayer('Yamada', { seasons: [2005, 2006] });

    expect(inner.searchPlayer).toHaveBeenCalledTimes(2);
    expect(inner.searchPlayer).toHaveBeenLastCalledWith('Yamada', { seasons: [2005, 2006] });
  });

  it('caches a NotFound answer', async () => {
    await provider.getPlayerStats('npb-1', { statsType: 'batting' });

    await expect(provider.getPlayerStats('npb-1', { season: null, statsType: 'batting' })).resolves.toEqual(
      NOT_FOUND
    );
    expect(inner.getPlayerStats).toHaveBeenCalledTimes(1);
  });

  it('leaves the abort signal out of the key', async () => {
    await provider.getTeamRoster('swallows', 2024, { signal: new AbortController().signal });
    await provider.getTeamRoster('swallows', 2024);

    expect(inner.getTeamRoster).toHaveBeenCalledTimes(1);
  });

  it('does not cache failures', async () => {
    inner.getTeams.mockRejectedValueOnce(TransportFailureException.timeout('league_site', 'teams'));

    await expect(provider.getTeams(2024)).rejects.toBeInstanceOf(TransportFailureException);
    await expect(provider.getTeams(2024)).resolves.toEqual([]);

    expect(inner.getTeams).toHaveBeenCalledTimes(2);
  });

  it('caches standings per season and league', async () => {
    await provider.getStandings({ season: 2024, league: 'central' });
    await provider.getStandings({ season: 2024, league: 'pacific' });
    await provider.getStandings({ season: 2024, league: 'central' });

    expect(inner.getStandings).toHaveBeenCalledTimes(2);
  });

  it('always runs health checks against the wrapped provider', async () => {
    await provider.healthCheck();
    await provider.healthCheck();

    expect(inner.healthCheck).toHaveBeenCalledTimes(2);
    expect(cache.entries.size).toBe(0);
  });
});
