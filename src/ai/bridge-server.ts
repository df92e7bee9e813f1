/**
 * WebSocket Bridge Server: RPC interface for external agents.
 *
 * Accepts JSON messages over WebSocket: reset, step, close.
 * Each connection gets its own HeadlessEnv instance.
 * Binds to localhost only (no LAN exposure).
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { DIFFICULTY_NAMES } from '../engine/constants';
import { describeError } from '../engine/errors';
import type { HighScoreStore } from '../engine/highscore';
import type { DifficultyName } from '../engine/types';
import { createLogger, type Logger } from '../utils/log';
import { HeadlessEnv, validateAction, type HeadlessEnvOptions } from './headless-env';

export type BridgeResponse =
  | { type: 'reset_result'; observation: number[]; info: Record<string, unknown> }
  | {
      type: 'step_result';
      observation: number[];
      reward: number;
      terminated: boolean;
      truncated: boolean;
      info: Record<string, unknown>;
    }
  | { type: 'close_result' }
  | { type: 'error'; message: string };

export interface BridgeOptions {
  port?: number;
  store?: HighScoreStore;
  logger?: Logger;
  /** Base options for every connection's env */
  env?: HeadlessEnvOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDifficultyName(value: unknown): value is DifficultyName {
  return DIFFICULTY_NAMES.some((name) => name === value);
}

/**
 * One connection's protocol state. Transport-free so it can be driven
 * directly in tests.
 */
export class BridgeSession {
  private env: HeadlessEnv | null = null;

  constructor(
    private readonly envOptions: HeadlessEnvOptions,
    private readonly log: Logger,
  ) {}

  handle(text: string): BridgeResponse {
    try {
      const msg: unknown = JSON.parse(text);
      if (!isRecord(msg)) {
        return { type: 'error', message: 'message must be a JSON object' };
      }
      return this.dispatch(msg);
    } catch (err) {
      const message = describeError(err);
      this.log.error(`request failed: ${message}`);
      return { type: 'error', message };
    }
  }

  close(): void {
    this.env = null;
  }

  private dispatch(msg: Record<string, unknown>): BridgeResponse {
    switch (msg.type) {
      case 'reset': {
        const difficulty = msg.difficulty;
        if (difficulty !== undefined && !isDifficultyName(difficulty)) {
          return { type: 'error', message: `difficulty must be one of ${DIFFICULTY_NAMES.join(', ')}` };
        }
        this.env ??= new HeadlessEnv(this.envOptions);
        const result = this.env.reset(difficulty);
        return { type: 'reset_result', observation: result.observation, info: result.info };
      }
      case 'step': {
        if (!this.env) {
          return { type: 'error', message: 'Call reset before step' };
        }
        const result = this.env.step(validateAction(msg.action));
        return {
          type: 'step_result',
          observation: result.observation,
          reward: result.reward,
          terminated: result.terminated,
          truncated: result.truncated,
          info: result.info,
        };
      }
      case 'close': {
        this.close();
        return { type: 'close_result' };
      }
      default:
        return { type: 'error', message: `Unknown message type: ${String(msg.type)}` };
    }
  }
}

export function startBridgeServer(options: BridgeOptions = {}) {
  const port = options.port ?? 9876;
  const log = options.logger ?? createLogger('bridge');
  const envOptions: HeadlessEnvOptions = {
    ...options.env,
    store: options.store,
    logger: log.child('env'),
  };

  const wss = new WebSocketServer({
    port,
    host: '127.0.0.1',
    perMessageDeflate: false,
    maxPayload: 65_536,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);
    const session = new BridgeSession(envOptions, log);

    ws.on('message', (data: RawData) => {
      ws.send(JSON.stringify(session.handle(data.toString())));
    });
    ws.on('close', () => session.close());
    ws.on('error', (err) => {
      log.error(`connection error: ${err.message}`);
      session.close();
    });
  });

  function shutdown(): void {
    log.info('shutting down...');
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    });
    wss.close(() => {
      log.info('closed');
      process.exit(0);
    });
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  wss.on('listening', () => {
    log.info(`listening on ws://127.0.0.1:${port}`);
  });

  return { wss, shutdown };
}
