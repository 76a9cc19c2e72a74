export { Team, League, teamRecord } from './teams.model';
export { teamSchema, leagueSchema, TeamInput, LeagueInput, parseTeam, parseLeague } from './teams.schemas';
export { getRosterGames } from './teams.service';
