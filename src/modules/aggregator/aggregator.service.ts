import { logger } from '../../config/logger.config';
import { Player, SeasonStats, StatsType, Team } from '../../domain/model/canonical.types';
import { fillMissingAdvanced, isAdvancedComplete } from '../../domain/stats/season-stats';
import { SourceProvider } from '../../integrations/shared/source-provider.interface';
import {
  CareerStatsFound,
  headlineStats,
  isFound,
  NOT_FOUND,
  PlayerStatsResult,
  RequestOptions,
  SeasonStatsFound,
  StandingsQuery,
  StandingsResult,
  unsupported,
} from '../../integrations/shared/source-provider.types';
import { settle, settleAll } from '../../shared/fan-out';
import { throwIfAborted, UnknownProviderException } from '../../utils/exceptions';
import { mergeCandidate } from './aggregator.model';

export const AGGREGATOR_OPERATIONS = ['search', 'stats', 'teams', 'roster', 'standings'] as const;

export type AggregatorOperation = (typeof AGGREGATOR_OPERATIONS)[number];

export type ProviderPriorities = Record<AggregatorOperation, string[]>;

export interface SearchOptions extends RequestOptions {
  /** Ask exactly this provider and return its raw answer */
  source?: string;
}

export interface PlayerStatsOptions extends RequestOptions {
  season?: number | null;
  statsType: StatsType;
  source?: string;
}

type StatsFound = SeasonStatsFound | CareerStatsFound;

function withHeadline(result: StatsFound, stats: SeasonStats): StatsFound {
  return result.kind === 'season' ? { ...result, stats } : { ...result, totals: stats };
}

/**
 * League Data Aggregator
 * Fans requests out over named providers in a configurable priority order
 * per operation. Constructed explicitly and handed to callers; there is no
 * process-wide instance.
 */
export class LeagueDataAggregator {
  private readonly providers: ReadonlyMap<string, SourceProvider>;
  private readonly priorities: ProviderPriorities;

  constructor(providers: Record<string, SourceProvider>, priorities: Partial<ProviderPriorities> = {}) {
    this.providers = new Map(Object.entries(providers));
    const everyProvider = Object.keys(providers);
    this.priorities = {
      search: everyProvider,
      stats: everyProvider,
      teams: everyProvider,
      roster: everyProvider,
      standings: everyProvider,
    };
    for (const operation of AGGREGATOR_OPERATIONS) {
      const names = priorities[operation];
      if (names) this.setPriority(operation, names);
    }
  }

  get providerNames(): string[] {
    return [...this.providers.keys()];
  }

  getPriority(operation: AggregatorOperation): string[] {
    return [...this.priorities[operation]];
  }

  /**
   * Replace one operation's provider order, highest priority first.
   * @throws UnknownProviderException when a name is not registered
   */
  setPriority(operation: AggregatorOperation, names: readonly string[]): void {
    for (const name of names) {
      if (!this.providers.has(name)) throw new UnknownProviderException(name);
    }
    this.priorities[operation] = [...names];
  }

  /**
   * Candidates for a name. Providers run in priority order and candidates are
   * merged by id or by a shared source id. When the first-priority provider
   * finds anyone, the others are not asked.
   */
  async searchPlayer(name: string, options: SearchOptions = {}): Promise<Player[]> {
    const { source, signal } = options;
    if (source !== undefined) {
      const provider = this.providers.get(source);
      if (!provider) return [];
      const outcome = await settle(source, () => provider.searchPlayer(name, { signal }));
      throwIfAborted(signal, 'aggregator.searchPlayer');
      return outcome.status === 'fulfilled' ? outcome.value : [];
    }

    const order = this.priorities.search;
    let candidates: Player[] = [];

    for (const [index, providerName] of order.entries()) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      const outcome = await settle(providerName, () => provider.searchPlayer(name, { signal }));
      throwIfAborted(signal, 'aggregator.searchPlayer');
      if (outcome.status === 'failed') continue;

      for (const player of outcome.value) candidates = mergeCandidate(candidates, player);

      if (index === 0 && candidates.length > 0) break;
    }

    logger.debug('Aggregated search', { name, candidates: candidates.length });
    return candidates;
  }

  /**
   * Statistics for a player id or a previously returned player. The first
   * provider with an answer supplies the result; later providers only fill
   * advanced fields it leaves unset.
   */
  async getPlayerStats(player: string | Player, options: PlayerStatsOptions): Promise<PlayerStatsResult> {
    const { source, signal } = options;
    const query = { season: options.season ?? null, statsType: options.statsType };
    const idFor = (providerName: string): string =>
      typeof player === 'string' ? player : (player.sourceIds[providerName] ?? player.id);

    if (source !== undefined) {
      const provider = this.providers.get(source);
      if (!provider) return NOT_FOUND;
      const outcome = await settle(source, () => provider.getPlayerStats(idFor(source), query, { signal }));
      throwIfAborted(signal, 'aggregator.getPlayerStats');
      return outcome.status === 'fulfilled' ? outcome.value : NOT_FOUND;
    }

    let best: StatsFound | null = null;

    for (const providerName of this.priorities.stats) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      const outcome = await settle(providerName, () =>
        provider.getPlayerStats(idFor(providerName), query, { signal })
      );
      throwIfAborted(signal, 'aggregator.getPlayerStats');
      if (outcome.status === 'failed' || !isFound(outcome.value)) continue;

      if (!best) {
        best = outcome.value;
      } else {
        const { stats, filled } = fillMissingAdvanced(headlineStats(best), headlineStats(outcome.value));
        if (filled.length > 0) {
          logger.debug('Filled advanced fields', { provider: providerName, fields: filled });
          best = withHeadline(best, stats);
        }
      }

      if (isAdvancedComplete(headlineStats(best))) break;
    }

    return best ?? NOT_FOUND;
  }

  /** First non-empty team list in priority order. */
  async getTeams(season?: number, options: RequestOptions = {}): Promise<Team[]> {
    for (const providerName of this.priorities.teams) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;
      const outcome = await settle(providerName, () => provider.getTeams(season, options));
      throwIfAborted(options.signal, 'aggregator.getTeams');
      if (outcome.status === 'fulfilled' && outcome.value.length > 0) return outcome.value;
    }
    return [];
  }

  /** First non-empty roster in priority order. */
  async getTeamRoster(teamId: string, season?: number, options: RequestOptions = {}): Promise<Player[]> {
    for (const providerName of this.priorities.roster) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;
      const outcome = await settle(providerName, () => provider.getTeamRoster(teamId, season, options));
      throwIfAborted(options.signal, 'aggregator.getTeamRoster');
      if (outcome.status === 'fulfilled' && outcome.value.length > 0) return outcome.value;
    }
    return [];
  }

  /** First provider that tracks the requested standings. */
  async getStandings(query: StandingsQuery = {}, options: RequestOptions = {}): Promise<StandingsResult> {
    for (const providerName of this.priorities.standings) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;
      const outcome = await settle(providerName, () => provider.getStandings(query, options));
      throwIfAborted(options.signal, 'aggregator.getStandings');
      if (outcome.status === 'fulfilled' && outcome.value.kind === 'standings') return outcome.value;
    }
    return unsupported('No configured provider tracks these standings');
  }

  /**
   * Probe every provider concurrently. A probe that throws records false.
   */
  async healthCheck(options: RequestOptions = {}): Promise<Record<string, boolean>> {
    const outcomes = await settleAll(
      [...this.providers].map(([name, provider]) => ({
        label: name,
        task: () => provider.healthCheck(options),
      })),
      options.signal,
      'aggregator.healthCheck'
    );

    const health: Record<string, boolean> = {};
    for (const outcome of outcomes) {
      health[outcome.label] = outcome.status === 'fulfilled' && outcome.value;
    }
    return health;
  }
}
