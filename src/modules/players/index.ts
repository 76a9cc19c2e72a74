export { Player, PlayerStatus, playerDisplayName } from './players.model';
export { playerSchema, PlayerInput, parsePlayer } from './players.schemas';
