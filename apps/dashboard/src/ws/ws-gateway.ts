import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { DashboardFrame, DisplaySurfacePort, LoggerPort } from '@vehicle-dash/domain';

type WsMessage = { type: 'frame'; data: DashboardFrame };

/** Display surface that pushes every frame to WebSocket clients on `/ws`. */
export class WsGateway implements DisplaySurfacePort {
  readonly name = 'websocket';

  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server, logger: LoggerPort) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    logger.info('listening on /ws');
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async render(frame: DashboardFrame): Promise<void> {
    this.broadcast({ type: 'frame', data: frame });
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
