export { createMatchesRouter } from './matches.controller';
