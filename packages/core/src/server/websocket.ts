import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingMessage, Server } from 'node:http';
import type { ClientEvent, DaemonEvent, EditorUser } from '@lectern/types';
import type { ConfigurationAggregator } from '../editor/index.js';
import { ClientEventSchema, RequestIdEnvelope } from './ws-schemas.js';
import { userFromHeaders } from './routes/identity.js';
import { UnauthenticatedError, isEditorConfigError } from '../errors.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('ws');

interface ClientConnection {
  ws: WebSocket;
  /** Null when the upgrade request carried no usable identity. */
  user: EditorUser | null;
}

function identify(req: IncomingMessage): EditorUser | null {
  try {
    return userFromHeaders(req.headers);
  } catch (err) {
    if (err instanceof UnauthenticatedError) return null;
    throw err;
  }
}

export class WebSocketManager {
  private wss: WebSocketServer;
  private clients = new Map<WebSocket, ClientConnection>();

  constructor(
    server: Server,
    private aggregator: ConfigurationAggregator,
  ) {
    this.wss = new WebSocketServer({ server });
    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.wss.on('connection', (ws, req) => {
      const client: ClientConnection = { ws, user: identify(req) };
      this.clients.set(ws, client);

      ws.on('message', (data) => {
        let raw: unknown;
        try {
          raw = JSON.parse(data.toString());
        } catch {
          this.send(ws, { type: 'error', error: 'Invalid JSON' });
          return;
        }
        const parsed = ClientEventSchema.safeParse(raw);
        if (!parsed.success) {
          log.warn({ issues: parsed.error.issues }, 'ws message validation failed');
          const envelope = RequestIdEnvelope.safeParse(raw);
          this.send(ws, {
            type: 'error',
            ...(envelope.success ? { requestId: envelope.data.requestId } : {}),
            kind: 'invalid_request',
            error: `Invalid message: ${parsed.error.issues.map((i) => i.message).join(', ')}`,
          });
          return;
        }
        this.handleClientEvent(client, parsed.data);
      });

      ws.on('close', () => {
        this.clients.delete(ws);
      });
    });
  }

  private handleClientEvent(client: ClientConnection, event: ClientEvent): void {
    switch (event.type) {
      case 'editor.getConfiguration': {
        try {
          if (!client.user) throw new UnauthenticatedError();
          const data = this.aggregator.getConfiguration(client.user, event.contextType, event.contextId);
          this.send(client.ws, { type: 'editor.configuration', requestId: event.requestId, data });
        } catch (err) {
          if (isEditorConfigError(err)) {
            this.send(client.ws, { type: 'error', requestId: event.requestId, kind: err.kind, error: err.message });
            return;
          }
          log.error({ err, requestId: event.requestId }, 'ws configuration request failed');
          this.send(client.ws, { type: 'error', requestId: event.requestId, error: 'Internal error' });
        }
        break;
      }
    }
  }

  broadcastEvent(event: DaemonEvent): void {
    log.debug({ type: event.type }, 'broadcasting event');
    for (const client of this.clients.values()) {
      this.send(client.ws, event);
    }
  }

  close(): void {
    for (const client of this.clients.values()) {
      if (client.ws.readyState === WebSocket.OPEN) {
        client.ws.close(1001, 'Server shutting down');
      }
    }
    this.clients.clear();
    this.wss.close();
  }

  private send(ws: WebSocket, event: DaemonEvent): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(event));
    }
  }
}
