import { STATUS_CODES } from 'node:http';
import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import { AppError, generateUlid } from '@barflow/shared';
import { extractBearerToken, verifyAccessToken } from '@barflow/core/auth/token';
import { logger, errorFields } from '@barflow/core/observability/logger';
import { LiveSession, WsTransport } from '@barflow/module-live';
import type { ChannelKey, ConnectionRegistry, SnapshotLoader } from '@barflow/module-live';
import { authorizeChannel, parseChannelPath } from './channel-target';
import type { ChannelTarget } from './channel-target';

export interface LiveChannelOptions {
  jwtSecret: string;
  idleTimeoutMs: number;
  sendTimeoutMs: number;
  maxPendingUpdates: number;
  maxBufferedBytes: number;
}

export interface LiveChannelDeps {
  registry: ConnectionRegistry;
  snapshotLoaderFor: (target: ChannelTarget) => SnapshotLoader;
}

export type UpgradeDecision =
  | { ok: true; key: ChannelKey; target: ChannelTarget }
  | { ok: false; status: number; message: string };

/** Decides whether an upgrade request may open a live channel. */
export function resolveUpgrade(req: IncomingMessage, jwtSecret: string): UpgradeDecision {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const target = parseChannelPath(url.pathname);
  if (!target) return { ok: false, status: 404, message: 'Unknown live channel' };

  try {
    const token = extractBearerToken(req.headers.authorization, url.searchParams.get('token'));
    if (!token) return { ok: false, status: 401, message: 'Authentication required' };
    const actor = verifyAccessToken(token, jwtSecret);
    return { ok: true, key: authorizeChannel(actor, target), target };
  } catch (error) {
    if (error instanceof AppError) {
      return { ok: false, status: error.statusCode, message: error.message };
    }
    throw error;
  }
}

function rejectUpgrade(socket: Duplex, status: number): void {
  socket.end(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

/**
 * Routes `GET /ws/bar/:barId/orders` and `GET /ws/user/:userId/orders`
 * upgrades on the HTTP server to live sessions.
 */
export function attachLiveChannels(
  server: Server,
  deps: LiveChannelDeps,
  options: LiveChannelOptions,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  const startSession = (ws: WebSocket, key: ChannelKey, target: ChannelTarget): void => {
    const session = new LiveSession(
      generateUlid(),
      key,
      new WsTransport(ws, options.maxBufferedBytes),
      deps.registry,
      {
        idleTimeoutMs: options.idleTimeoutMs,
        sendTimeoutMs: options.sendTimeoutMs,
        maxPendingUpdates: options.maxPendingUpdates,
      },
    );

    ws.on('message', () => session.received());
    ws.on('close', () => session.disconnected());
    ws.on('error', (error) => {
      logger.warn('Live channel socket error', {
        channelKey: key,
        channelId: session.id,
        error: errorFields(error),
      });
      session.disconnected();
    });

    session.open(deps.snapshotLoaderFor(target)).catch((error: unknown) => {
      logger.error('Live channel failed to open', { channelKey: key, error: errorFields(error) });
      session.close(1011, 'sync failed');
    });
  };

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    let decision: UpgradeDecision;
    try {
      decision = resolveUpgrade(req, options.jwtSecret);
    } catch (error) {
      logger.error('Live channel upgrade failed', { path: req.url, error: errorFields(error) });
      rejectUpgrade(socket, 500);
      return;
    }

    if (!decision.ok) {
      logger.info('Live channel rejected', { path: req.url, statusCode: decision.status, reason: decision.message });
      rejectUpgrade(socket, decision.status);
      return;
    }

    const { key, target } = decision;
    wss.handleUpgrade(req, socket, head, (ws) => startSession(ws, key, target));
  });

  return wss;
}
