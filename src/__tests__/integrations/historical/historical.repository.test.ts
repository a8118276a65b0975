import { Pool } from 'pg';
import { ZodError } from 'zod';
import {
  HistoricalRepository,
  toContainsPattern,
} from '../../../integrations/historical/historical.repository';

jest.mock('../../../config/logger.config', () => ({
  logger: { warn: jest.fn(), info: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('toContainsPattern', () => {
  it('wraps the text in wildcards and escapes LIKE metacharacters', () => {
    expect(toContainsPattern('Sato')).toBe('%Sato%');
    expect(toContainsPattern('100%_a\\b')).toBe('%100\\%\\_a\\\\b%');
  });
});

describe('HistoricalRepository', () => {
  let query: jest.Mock;
  let repository: HistoricalRepository;

  beforeEach(() => {
    query = jest.fn().mockResolvedValue({ rows: [] });
    repository = new HistoricalRepository({ query } as unknown as Pool);
  });

  it('skips the query when there are no patterns', async () => {
    await expect(repository.searchPlayers([])).resolves.toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });

  it('coerces BIGINT counts and empty arrays from search rows', async () => {
    query.mockResolvedValue({
      rows: [
        {
          player_id: 'hist-0001',
          name_english: 'Taro Yamada',
          name_japanese: null,
          name_variants: null,
          source_ids: null,
          primary_position: 'OF',
          first_season: 2002,
          last_season: 2004,
          batting_seasons: '3',
          pitching_seasons: '0',
        },
      ],
    });

    const rows = await repository.searchPlayers(['%Yamada%']);

    expect(query.mock.calls[0][1]).toEqual([['%Yamada%'], 50]);
    expect(rows[0]).toMatchObject({
      name_variants: [],
      source_ids: {},
      batting_seasons: 3,
      pitching_seasons: 0,
    });
  });

  it('resolves a missing player to null', async () => {
    await expect(repository.findPlayer('hist-9999')).resolves.toBeNull();
    expect(query.mock.calls[0][1]).toEqual(['hist-9999']);
  });

  it('passes a null season for whole-career reads', async () => {
    await repository.findBattingSeasons('hist-0001');
    await repository.findPitchingSeasons('hist-0001', 1999);

    expect(query.mock.calls[0][1]).toEqual(['hist-0001', null]);
    expect(query.mock.calls[1][1]).toEqual(['hist-0001', 1999]);
  });

  it('reads NUMERIC metrics returned as strings', async () => {
    query.mockResolvedValue({
      rows: [
        {
          player_id: 'hist-0001',
          seasons: '3',
          games: '395',
          war: '9.3',
          plate_appearances: '1630',
          at_bats: '1440',
          runs: '215',
          hits: '430',
          doubles: '83',
          triples: '6',
          home_runs: '60',
          rbi: '237',
          stolen_bases: '30',
          caught_stealing: '12',
          walks: '155',
          hit_by_pitch: '12',
          sacrifice_flies: '17',
          strikeouts: '265',
        },
      ],
    });

    const career = await repository.findBattingCareer('hist-0001');

    expect(career?.war).toBe(9.3);
    expect(career?.games).toBe(395);
  });

  it('rejects rows that do not match the schema', async () => {
    query.mockResolvedValue({ rows: [{ team_id: 'x', name_english: 'X', league: 'western' }] });

    await expect(repository.findTeams()).rejects.toBeInstanceOf(ZodError);
  });

  it('pings with a trivial select', async () => {
    query.mockResolvedValue({ rows: [{ ok: 1 }] });
    await expect(repository.ping()).resolves.toBe(true);
  });

  it('merges source ids on player upsert', async () => {
    await repository.upsertPlayer({
      playerId: 'hist-0001',
      nameEnglish: 'Taro Yamada',
      nameJapanese: null,
      nameVariants: ['Yamada Taro'],
      sourceIds: { league_site: 'npb-90000001' },
      primaryPosition: 'OF',
    });

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('source_ids = historical_players.source_ids || EXCLUDED.source_ids');
    expect(params).toEqual([
      'hist-0001',
      'Taro Yamada',
      null,
      ['Yamada Taro'],
      '{"league_site":"npb-90000001"}',
      'OF',
    ]);
  });
});
