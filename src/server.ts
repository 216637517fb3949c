import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { WebSocketServer, type WebSocket } from 'ws';
import { CallManager, TELNYX_MEDIA_PATH_PREFIX } from './calls/callManager';
import { env } from './env';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { SmtpNotifier, smtpSettingsFromEnv } from './notifications/emailNotifier';
import { PgClientRepository } from './persistence/pgClientRepository';
import { createHealthRouter } from './routes/health';
import { createTelnyxWebhookRouter, type RequestWithRawBody } from './routes/telnyxWebhook';
import { TelnyxClient } from './telnyx/telnyxClient';

export const BROWSER_MEDIA_PATH = '/v1/web/ws';

type MediaRoute = { kind: 'telnyx'; callControlId: string } | { kind: 'browser' };

function requestIdMiddleware(req: RequestWithRawBody, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  req.id = requestId;
  next();
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  log.error({ err, event: 'http_unhandled_error' }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function parseMediaRequest(rawUrl: string | undefined, host = 'localhost', token = env.MEDIA_STREAM_TOKEN): MediaRoute | null {
  if (!rawUrl) {
    return null;
  }

  const url = new URL(rawUrl, `http://${host}`);
  if (url.pathname === BROWSER_MEDIA_PATH) {
    return { kind: 'browser' };
  }
  if (!url.pathname.startsWith(TELNYX_MEDIA_PATH_PREFIX)) {
    return null;
  }

  const callControlId = decodeURIComponent(url.pathname.slice(TELNYX_MEDIA_PATH_PREFIX.length));
  if (!callControlId || callControlId.includes('/')) {
    return null;
  }
  if (url.searchParams.get('token') !== token) {
    return null;
  }
  return { kind: 'telnyx', callControlId };
}

function attachMediaWebSocketServer(server: http.Server, calls: CallManager): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const route = parseMediaRequest(request.url, request.headers.host);
    if (!route) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
      const bridge =
        route.kind === 'telnyx' ? calls.attachTelnyxMedia(route.callControlId, ws) : calls.attachBrowser(ws);
      if (!bridge) {
        ws.close(1008, 'call_not_accepted');
        return;
      }
      log.info({ event: 'media_socket_connected', kind: route.kind, call_id: bridge.callId }, 'media socket connected');
    });
  });

  return wss;
}

export interface BuiltServer {
  app: express.Express;
  server: http.Server;
  calls: CallManager;
  wss: WebSocketServer;
}

export function buildServer(calls?: CallManager): BuiltServer {
  const callManager =
    calls ??
    new CallManager({
      callControl: new TelnyxClient(),
      collaborators: {
        clients: new PgClientRepository(),
        notifier: new SmtpNotifier(smtpSettingsFromEnv()),
        supportEmail: env.SUPPORT_EMAIL,
      },
    });

  const app = express();
  app.disable('x-powered-by');
  app.use(
    express.json({
      verify: (req, _res, buf) => {
        Object.assign(req, { rawBody: buf });
      },
    }),
  );
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(callManager.registry));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/telnyx/webhook', createTelnyxWebhookRouter(callManager));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, callManager);

  return { app, server, calls: callManager, wss };
}
