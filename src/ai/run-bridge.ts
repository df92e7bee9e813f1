import { createLogger } from '../utils/log';
import { startBridgeServer } from './bridge-server';
import { DEFAULT_HIGH_SCORE_FILE, FileHighScoreStore } from './file-high-score-store';

const log = createLogger('bridge');

const port = parseInt(process.env.BRIDGE_PORT ?? '9876', 10);
if (!Number.isFinite(port) || port < 1 || port > 65535) {
  log.error(`Invalid port: ${process.env.BRIDGE_PORT}. Must be 1-65535.`);
  process.exit(1);
}

startBridgeServer({
  port,
  logger: log,
  store: new FileHighScoreStore(process.env.HIGH_SCORE_FILE ?? DEFAULT_HIGH_SCORE_FILE, log.child('highscore')),
});
