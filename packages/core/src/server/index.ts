import { createServer } from 'node:http';
import type { Express } from 'express';
import { createHttpServer } from './http.js';
import { WebSocketManager } from './websocket.js';
import type { EditorStack } from '../editor/index.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('server');

export interface ServerManager {
  start(port: number): Promise<void>;
  stop(): Promise<void>;
}

export function createServerManager(stack: EditorStack): ServerManager {
  let wsManager: WebSocketManager | null = null;
  const app: Express = createHttpServer({ ...stack, emitEvent: (event) => wsManager?.broadcastEvent(event) });
  const httpServer = createServer(app);

  return {
    async start(port: number): Promise<void> {
      wsManager = new WebSocketManager(httpServer, stack.aggregator);

      return new Promise((resolve) => {
        httpServer.listen(port, '127.0.0.1', () => {
          log.info({ port }, 'Lectern daemon listening on http://127.0.0.1:%d', port);
          resolve();
        });
      });
    },

    async stop(): Promise<void> {
      wsManager?.close();
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

export { createHttpServer } from './http.js';
export { WebSocketManager } from './websocket.js';
