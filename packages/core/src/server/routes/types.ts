import type { DaemonEvent } from '@lectern/types';
import type { EditorStack } from '../../editor/index.js';

export interface RouteContext extends EditorStack {
  /** Pushes an event to connected WebSocket clients; a no-op before the socket server starts. */
  emitEvent: (event: DaemonEvent) => void;
}
