import { Server as HttpServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { z } from 'zod';

import { verifyAccessToken } from '../module/auth/middlewares/auth.middleware';
import type { AuthUser } from '../module/auth/types/auth.types';
import type { Notification } from '../module/notifications/types/notifications.types';
import logger from '../utils/logger';

export interface ServerToClientEvents {
  notification: (notification: Notification) => void;
}

export interface ClientToServerEvents {
  'client:subscribe': (clientId: unknown) => void;
  'client:unsubscribe': (clientId: unknown) => void;
}

type InterServerEvents = Record<string, never>;

type SocketData = { user: AuthUser };

export type NotificationServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

let io: NotificationServer | null = null;

export const userRoom = (userId: number) => `user:${userId}`;
export const clientRoom = (clientId: number) => `client:${clientId}`;
export const STAFF_ROOM = 'staff';

const clientIdSchema = z.coerce.number().int().positive();

export const initSocketServer = (server: HttpServer, corsOrigin: string | string[] = '*') => {
  const ioServer: NotificationServer = new SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(server, {
    cors: {
      origin: corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  io = ioServer;

  // Same bearer token as the REST API, passed in the handshake auth payload.
  ioServer.use((socket, next) => {
    const token: unknown = socket.handshake.auth.token;
    const user = typeof token === 'string' ? verifyAccessToken(token) : null;
    if (!user) {
      next(new Error('UNAUTHORIZED'));
      return;
    }
    socket.data.user = user;
    next();
  });

  ioServer.on('connection', (socket) => {
    const user = socket.data.user;
    if (!user) {
      socket.disconnect(true);
      return;
    }
    void socket.join(userRoom(user.id));
    if (user.role !== 'chauffeur') void socket.join(STAFF_ROOM);
    logger.info(`🧠 Nouveau client connecté : ${socket.id} (user ${user.id})`);

    // Back-office staff follow a client's feed on demand.
    socket.on('client:subscribe', (raw) => {
      const parsed = clientIdSchema.safeParse(raw);
      if (!parsed.success || user.role === 'chauffeur') return;
      void socket.join(clientRoom(parsed.data));
    });

    socket.on('client:unsubscribe', (raw) => {
      const parsed = clientIdSchema.safeParse(raw);
      if (parsed.success) void socket.leave(clientRoom(parsed.data));
    });

    socket.on('disconnect', () => {
      logger.info(`❌ Client déconnecté : ${socket.id}`);
    });
  });

  return ioServer;
};

export const getIO = (): NotificationServer => {
  if (!io) throw new Error("Socket.io n'est pas initialisé !");
  return io;
};

/** Null before initSocketServer (tests, jobs run from a script). */
export const tryGetIO = (): NotificationServer | null => io;
