import express, { type Request, type Response } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import type { Server } from 'http';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  AuthenticationError,
  ConflictError,
  CredentialRequiredError,
  NonExistentRecipientError,
} from './types.js';
import { loggerService } from './services/loggerService.js';
import { settingsService } from './services/settingsService.js';
import { createPasswordHasher } from './services/passwordService.js';
import { createSnapshotService, type SnapshotService } from './services/snapshotService.js';
import { createMessengerService, type MessengerService } from './services/messengerService.js';
import { ReadWriteLock } from './services/stateLock.js';

dotenv.config();

const registerSchema = z.object({
  username: z.string().min(1),
  password: z.string().optional(),
});

const sendSchema = z.object({
  password: z.string().optional(),
  message: z.object({
    author: z.string().min(1),
    content: z.string(),
    recipients: z.array(z.string()).default([]),
  }),
});

const receiveSchema = z.object({
  username: z.string().min(1),
  password: z.string().optional(),
  timestamp: z.number().int().nonnegative(),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');

const statusFor = (error: unknown): number => {
  if (error instanceof ConflictError) return 409;
  if (error instanceof AuthenticationError) return 401;
  if (error instanceof NonExistentRecipientError) return 406;
  if (error instanceof CredentialRequiredError) return 400;
  return 500;
};

const sendError = (req: Request, res: Response, error: unknown) => {
  const status = statusFor(error);
  if (status >= 500) {
    loggerService.error(`Error in ${req.method} ${req.path}`, { error });
    res.status(status).json({ error: 'Internal server error' });
    return;
  }
  loggerService.debug(`Rejected ${req.method} ${req.path}`, { status });
  res.status(status).json({ error: error instanceof Error ? error.message : String(error) });
};

export const createApp = (messenger: MessengerService) => {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request Logging Middleware (bodies carry passwords and are never logged)
  app.use((req, res, next) => {
    loggerService.info(`Request: ${req.method} ${req.path}`);
    next();
  });

  app.get('/', (req, res) => {
    res.send('Hello, world!');
  });

  // Health Check Endpoint
  app.get('/api/health', async (req, res) => {
    try {
      const stats = await messenger.stats();
      res.json({ status: 'healthy', ...stats, timestamp: new Date().toISOString() });
    } catch (e) {
      sendError(req, res, e);
    }
  });

  // Register identity
  app.post('/register', async (req, res) => {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    try {
      await messenger.register(parsed.data.username, parsed.data.password);
      res.status(200).end();
    } catch (e) {
      sendError(req, res, e);
    }
  });

  // Send message
  app.post('/message', async (req, res) => {
    const parsed = sendSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    try {
      await messenger.send(parsed.data.message, parsed.data.password);
      res.status(200).end();
    } catch (e) {
      sendError(req, res, e);
    }
  });

  // Receive messages (JSON body on GET)
  app.get('/message', async (req, res) => {
    const parsed = receiveSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    try {
      const { username, password, timestamp } = parsed.data;
      const messages = await messenger.receive(username, password, timestamp);
      res.json(messages);
    } catch (e) {
      sendError(req, res, e);
    }
  });

  return app;
};

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

/**
 * Stops accepting connections and waits for in-flight requests to finish, then
 * writes the snapshot under the write lock. The snapshot is written even if
 * closing fails. Rejects if the snapshot cannot be written.
 */
export const shutdown = async (server: Server, messenger: MessengerService, snapshot: SnapshotService) => {
  loggerService.info('Shutting down, saving state...');
  try {
    await closeServer(server);
  } finally {
    await messenger.persist(snapshot);
  }
};

const main = async () => {
  const settings = settingsService.getServerSettings();
  const hasher = settings.requireCredentials
    ? createPasswordHasher({ cost: settings.bcryptCost, salt: settings.passwordSalt })
    : null;

  const snapshot = createSnapshotService({
    usersFile: settings.usersFile,
    messagesFile: settings.messagesFile,
  });
  const { directory, messageLog } = await snapshot.load({ hasher });
  const messenger = createMessengerService({ directory, messageLog, lock: new ReadWriteLock() });

  const app = createApp(messenger);
  const server = app.listen(settings.port, settings.host, () => {
    loggerService.info(`Pigeon server running on ${settings.host}:${settings.port}`, {
      credentials: settings.requireCredentials,
    });
  });

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    loggerService.info(`Received ${signal}`);
    shutdown(server, messenger, snapshot)
      .then(() => process.exit(0))
      .catch((error) => {
        loggerService.error('Failed to save state on shutdown', { error });
        process.exit(1);
      });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    loggerService.error('Startup failed', { error });
    process.exit(1);
  });
}
