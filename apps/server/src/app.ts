import express from 'express';
import { createServer } from 'http';
import { Server } from 'socket.io';
import cors from 'cors';
import type {
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData,
} from '@feltcast/shared';
import { TableManager } from './table/TableManager';
import { createTableRouter } from './table/tableRoutes';
import { createAuthRouter } from './auth/authRoutes';
import { createCardRouter } from './dealer/cardRoutes';
import { registerSocketHandlers } from './socket/SocketHandler';
import { getRedis, initRedis } from './redis/RedisClient';
import { CardMapStore } from './redis/CardMapStore';
import { createRateLimiters } from './middleware/rateLimiter';
import { errorHandler } from './middleware/errorHandler';

export interface AppOptions {
  skipRedis?: boolean;
  redisUrl?: string;
  corsOrigin?: string;
  generalRateLimit?: number;
}

export interface AppInstance {
  app: express.Application;
  httpServer: ReturnType<typeof createServer>;
  io: Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
  tables: TableManager;
  cardMap: CardMapStore;
}

export async function createApp(opts: AppOptions = {}): Promise<AppInstance> {
  const { skipRedis = false, redisUrl, corsOrigin = '*', generalRateLimit } = opts;

  const app = express();
  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  // ── Rate limiting (all API routes) ─────────────────────────────────────
  const limiters = createRateLimiters({ generalMax: generalRateLimit });
  app.use('/api', limiters.general);

  // ── Health check ───────────────────────────────────────────────────────
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const httpServer = createServer(app);
  const io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(
    httpServer,
    {
      cors: { origin: corsOrigin, methods: ['GET', 'POST'] },
      transports: ['websocket'],
    },
  );

  if (!skipRedis) {
    await initRedis(redisUrl);
  }

  const tables = new TableManager(io);
  const cardMap = new CardMapStore(skipRedis ? null : getRedis());

  // ── API routes ─────────────────────────────────────────────────────────
  app.use('/api',        createAuthRouter(tables, limiters));
  app.use('/api/tables', createTableRouter(tables, cardMap));
  app.use('/api/cards',  createCardRouter(cardMap));
  app.use(errorHandler);

  registerSocketHandlers(io, tables);

  return { app, httpServer, io, tables, cardMap };
}
