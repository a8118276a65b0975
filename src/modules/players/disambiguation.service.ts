import { logger } from '../../config/logger.config';
import { Player } from '../../domain/model/canonical.types';
import { headlineStats, isFound, RequestOptions } from '../../integrations/shared/source-provider.types';
import { LeagueDataAggregator } from '../aggregator/aggregator.service';
import { settleAll } from '../../shared/fan-out';
import { AmbiguousPlayerException, NotFoundException } from '../../utils/exceptions';

export type DisambiguationStatus = 'none' | 'single' | 'resolved' | 'ambiguous' | 'unconfirmed';

export interface DisambiguationResult {
  status: DisambiguationStatus;
  query: string;
  /** Players the caller should use */
  players: Player[];
  /** Every candidate the search returned */
  candidates: Player[];
  /** Set only when two or more candidates have recorded stats */
  ambiguous: boolean;
  message: string | null;
}

/**
 * Narrows a name search to the candidates that have actually played in the
 * league, by probing each one's career stats concurrently.
 */
export class DisambiguationService {
  constructor(private readonly aggregator: LeagueDataAggregator) {}

  async findPlayer(name: string, options: RequestOptions = {}): Promise<DisambiguationResult> {
    const candidates = await this.aggregator.searchPlayer(name, options);
    return this.disambiguate(name, candidates, options);
  }

  async disambiguate(
    query: string,
    candidates: Player[],
    options: RequestOptions = {}
  ): Promise<DisambiguationResult> {
    const result = (
      status: DisambiguationStatus,
      players: Player[],
      message: string | null = null
    ): DisambiguationResult => ({
      status,
      query,
      players,
      candidates,
      ambiguous: status === 'ambiguous',
      message,
    });

    if (candidates.length === 0) return result('none', [], `No players found matching "${query}"`);
    if (candidates.length === 1) return result('single', candidates);

    const outcomes = await settleAll(
      candidates.map((candidate) => ({
        label: `probe.${candidate.id}`,
        metric: 'disambiguation.probe',
        task: () => this.hasRecordedStats(candidate, options),
      })),
      options.signal,
      'disambiguation.probe'
    );
    const withStats = candidates.filter((_, index) => {
      const outcome = outcomes[index];
      return outcome.status === 'fulfilled' && outcome.value;
    });

    logger.debug('Disambiguation probe', {
      query,
      candidates: candidates.length,
      withStats: withStats.length,
    });

    if (withStats.length === 1) return result('resolved', withStats);
    if (withStats.length > 1) {
      return result(
        'ambiguous',
        withStats,
        `${withStats.length} players named "${query}" have recorded stats; re-query by id: ${withStats
          .map((player) => player.id)
          .join(', ')}`
      );
    }
    return result(
      'unconfirmed',
      candidates,
      `None of the ${candidates.length} players matching "${query}" have confirmed stats in this league`
    );
  }

  /**
   * Exactly one player for a name.
   * @throws NotFoundException when nobody matches
   * @throws AmbiguousPlayerException when more than one candidate remains,
   * whether or not any of them has confirmed stats
   */
  async requireSinglePlayer(name: string, options: RequestOptions = {}): Promise<Player> {
    const outcome = await this.findPlayer(name, options);
    const [first] = outcome.players;
    if (!first) throw new NotFoundException(`No player found matching "${name}"`);
    if (outcome.players.length > 1) {
      throw new AmbiguousPlayerException(
        name,
        outcome.players.map((player) => player.id),
        outcome.status !== 'unconfirmed'
      );
    }
    return first;
  }

  /** Career batting games, or career pitching games when there are none. */
  private async hasRecordedStats(candidate: Player, options: RequestOptions): Promise<boolean> {
    for (const statsType of ['batting', 'pitching'] as const) {
      const stats = await this.aggregator.getPlayerStats(candidate, {
        season: null,
        statsType,
        signal: options.signal,
      });
      if (isFound(stats) && headlineStats(stats).games > 0) return true;
    }
    return false;
  }
}
