export { createMatchmakingRouter } from './matchmaking.controller';
