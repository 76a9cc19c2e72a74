import {
  consistencyRating,
  formatBackToBacks,
  formatGameDetail,
  formatPercent,
  formatPlayerList,
  formatSigned,
  formatTeamList,
  formatTrends,
  formatUpcomingGames,
} from '../../cli/formatters';
import { makeGame } from '../helpers/factories';

describe('formatters', () => {
  it('rates consistency by coefficient of variation', () => {
    expect(consistencyRating(19.9)).toBe('Very Consistent');
    expect(consistencyRating(20)).toBe('Consistent');
    expect(consistencyRating(39.9)).toBe('Consistent');
    expect(consistencyRating(40)).toBe('Inconsistent');
  });

  it('signs positive numbers only', () => {
    expect(formatSigned(4)).toBe('+4.0');
    expect(formatSigned(-2.25)).toBe('-2.3');
    expect(formatSigned(0)).toBe('0.0');
  });

  it('formats ratios as percentages', () => {
    expect(formatPercent(0.5)).toBe('50.0%');
    expect(formatPercent(1 / 3)).toBe('33.3%');
  });

  it('prints placeholders for empty results', () => {
    expect(formatPlayerList([])).toEqual(['No players found.']);
    expect(formatUpcomingGames([], 7)).toEqual(['No upcoming games found.']);
    expect(formatBackToBacks('BOS', [])).toEqual(['No back-to-back games found for BOS.']);
  });

  it('keeps the league header above an empty team list', () => {
    const league = {
      leagueId: 'lg1',
      name: 'Quiet League',
      season: '2025-26',
      format: 'roto' as const,
      numTeams: 8,
      rosterSize: 12,
    };
    expect(formatTeamList([], league)).toEqual([
      'Quiet League 2025-26 (roto): 0/8 teams, rosters of 12',
      'No teams found.',
    ]);
  });

  it('adds the score line only when both scores are known', () => {
    const game = makeGame({ gameId: 'g7', homeTeam: 'BOS', awayTeam: 'MIA' });
    expect(formatGameDetail(game)).toEqual([
      'Game g7: MIA @ BOS',
      '-'.repeat(60),
      'Tip-off: 2024-11-01 19:00 UTC',
      'Status: scheduled',
    ]);

    const played = formatGameDetail({ ...game, status: 'final', homeScore: 110, awayScore: 104 });
    expect(played[3]).toBe('Status: final');
    expect(played[4]).toBe('Score: MIA 104 - BOS 110');
    expect(formatGameDetail({ ...game, homeScore: 99 })).toHaveLength(4);
  });

  it('shows a flat trend with a sideways arrow and skips missing stats', () => {
    expect(formatTrends('X', { reboundsChange: 0 })).toEqual([
      'Performance Trends for X:',
      '-'.repeat(60),
      'Rebounds  : 0.0% →',
    ]);
  });
});
