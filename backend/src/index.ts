import './loadEnv.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { BallchasingClient } from './data/ballchasingClient.js';
import { MatchStore } from './db/matchStore.js';
import { AiCoach } from './coach/aiCoach.js';
import { PlayerService } from './playerService.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig();
const logger = createLogger(undefined, config.logLevel);

if (!config.ballchasing.apiKey) {
  logger.warn('BALLCHASING_API_KEY is not set; replay fetches will return nothing');
}
if (!config.coach.apiKey) {
  logger.warn('GROQ_API_KEY is not set; AI coaching is disabled');
}

const store = await MatchStore.open(config.databasePath, { logger: logger.child('match-store') });

const service = new PlayerService(
  new BallchasingClient(config.ballchasing, { logger: logger.child('ballchasing') }),
  store,
  new AiCoach(config.coach, { logger: logger.child('coach') }),
  logger.child('player-service')
);

const app = createApp(service, { corsOrigins: config.corsOrigins, logger: logger.child('http') });

app.listen(config.port, () => {
  logger.info('Server is running', { port: config.port, databasePath: config.databasePath });
});
