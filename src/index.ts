import { createServer } from 'http';

import app from './config/app';
import { closePool } from './config/database';
import { settings } from './config/settings';
import { eventBus } from './events/domain-events';
import { jobScheduler } from './jobs';
import { PersistingNotificationDispatcher } from './module/notifications/lib/dispatcher';
import { registerNotificationHandlers } from './module/notifications/lib/handlers';
import { initSocketServer } from './sockets/socketServer';
import logger from './utils/logger';

// 🛠 Serveur HTTP de base
const httpServer = createServer(app);

// 🔌 Initialisation du serveur WebSocket
initSocketServer(httpServer);

// 🔔 Événements métier -> notifications
registerNotificationHandlers(eventBus, new PersistingNotificationDispatcher());

// ⏱ Tâches planifiées
if (settings.JOBS_ENABLED) {
  jobScheduler.start();
}

// 🚀 Lancement du serveur
httpServer.listen(settings.PORT, '0.0.0.0', () => {
  logger.info(`🚀 Serveur transport lancé sur http://0.0.0.0:${settings.PORT}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} reçu, arrêt du serveur`);
  jobScheduler.stop();
  httpServer.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Fermeture du pool PostgreSQL impossible', err);
        process.exit(1);
      });
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
