import { logger } from '../../config/logger.config';
import { Player, Team } from '../../domain/model/canonical.types';
import { metrics } from '../../services/metrics.service';
import { CacheStore, cacheKey } from '../../services/cache.service';
import { SourceProvider } from './source-provider.interface';
import {
  PlayerSearchOptions,
  PlayerStatsResult,
  RequestOptions,
  StandingsQuery,
  StandingsResult,
  StatsQuery,
} from './source-provider.types';

export const DEFAULT_CACHE_TTL_SECONDS = 86400;

/**
 * Read-through cache around a provider. Every read operation is keyed by
 * provider, operation and arguments (the abort signal is not part of the
 * key). Health checks always reach the wrapped provider.
 */
export class CachedSourceProvider implements SourceProvider {
  readonly providerId: string;

  constructor(
    private readonly inner: SourceProvider,
    private readonly cache: CacheStore,
    private readonly ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS
  ) {
    this.providerId = inner.providerId;
  }

  searchPlayer(name: string, options: PlayerSearchOptions = {}): Promise<Player[]> {
    const seasons = options.seasons ? options.seasons.join(',') : undefined;
    return this.cached('searchPlayer', [name, seasons], () => this.inner.searchPlayer(name, options));
  }

  getPlayerStats(playerId: string, query: StatsQuery, options: RequestOptions = {}): Promise<PlayerStatsResult> {
    return this.cached('getPlayerStats', [playerId, query.season, query.statsType], () =>
      this.inner.getPlayerStats(playerId, query, options)
    );
  }

  getTeams(season?: number, options: RequestOptions = {}): Promise<Team[]> {
    return this.cached('getTeams', [season], () => this.inner.getTeams(season, options));
  }

  getTeamRoster(teamId: string, season?: number, options: RequestOptions = {}): Promise<Player[]> {
    return this.cached('getTeamRoster', [teamId, season], () => this.inner.getTeamRoster(teamId, season, options));
  }

  getStandings(query: StandingsQuery = {}, options: RequestOptions = {}): Promise<StandingsResult> {
    return this.cached('getStandings', [query.season, query.league], () => this.inner.getStandings(query, options));
  }

  healthCheck(options: RequestOptions = {}): Promise<boolean> {
    return this.inner.healthCheck(options);
  }

  private async cached<T>(operation: string, args: readonly unknown[], load: () => Promise<T>): Promise<T> {
    const key = cacheKey(`${this.providerId}.${operation}`, args);

    const hit = await this.cache.get<T>(key);
    if (hit !== null) {
      metrics.increment(`cache.${this.providerId}.hit`);
      logger.debug('Cache hit', { provider: this.providerId, operation });
      return hit;
    }

    metrics.increment(`cache.${this.providerId}.miss`);
    const value = await load();
    await this.cache.set(key, value, this.ttlSeconds);
    return value;
  }
}
