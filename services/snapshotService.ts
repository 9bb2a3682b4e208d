import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Clock, Credential, Message, Timestamp, Username } from '../types.js';
import { Directory } from './directoryService.js';
import { MessageLog } from './messageLogService.js';
import type { PasswordHasher } from './passwordService.js';
import { loggerService } from './loggerService.js';

const isPlainObject = (value: unknown): value is object =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Users are validated as [username, credential] entries so that any key,
// "__proto__" included, loads as an ordinary username.
const usersSchema = z.union([
  z.preprocess(
    (value) => (isPlainObject(value) ? Object.entries(value) : value),
    z.array(z.tuple([z.string(), z.string().nullable()]))
  ),
  // Bare deployments may have written a plain list of usernames
  z.array(z.string()).transform((usernames) =>
    usernames.map((username): [Username, Credential] => [username, null])
  ),
]);

const messageSchema = z.object({
  author: z.string(),
  content: z.string(),
  recipients: z.array(z.string()).default([]),
});

const messagesSchema = z.record(z.string().regex(/^\d+$/, 'timestamp keys must be decimal integers'), z.array(messageSchema));

export interface SnapshotPaths {
  usersFile: string;
  messagesFile: string;
}

export interface LoadOptions {
  hasher: PasswordHasher | null;
  clock?: Clock;
}

type ReadOutcome<T> = { ok: true; value: T } | { ok: false };

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads and validates one snapshot file. Never throws: a missing, unreadable
 * or corrupt file is logged (each with its own message) and reported as not ok.
 */
const readSnapshotFile = async <T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): Promise<ReadOutcome<T>> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      loggerService.warn(`${filePath} not found, using new ${label}`);
    } else {
      loggerService.warn(`Error reading ${filePath}, using new ${label}`, { error });
    }
    return { ok: false };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    loggerService.warn(`${filePath} is corrupt (invalid JSON), using new ${label}`, { error });
    return { ok: false };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    loggerService.warn(`${filePath} is corrupt (unexpected shape), using new ${label}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return { ok: false };
  }
  return { ok: true, value: result.data };
};

const writeFileAtomic = async (filePath: string, data: unknown): Promise<void> => {
  const tempPath = `${filePath}.tmp`;
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(tempPath, JSON.stringify(data), 'utf8');
  await fs.rename(tempPath, filePath);
};

const toLogEntries = (messages: z.infer<typeof messagesSchema>): [Timestamp, Message[]][] =>
  Object.entries(messages).map(([key, bucket]): [Timestamp, Message[]] => [Number(key), bucket]);

export type SnapshotService = ReturnType<typeof createSnapshotService>;

export const createSnapshotService = ({ usersFile, messagesFile }: SnapshotPaths) => ({
  paths: { usersFile, messagesFile },

  /**
   * Each file is loaded independently; whichever fails starts empty.
   */
  load: async ({ hasher, clock }: LoadOptions): Promise<{ directory: Directory; messageLog: MessageLog }> => {
    const [users, messages] = await Promise.all([
      readSnapshotFile(usersFile, usersSchema, 'userlist'),
      readSnapshotFile(messagesFile, messagesSchema, 'message list'),
    ]);

    const directory = new Directory(hasher, users.ok ? users.value : []);
    const messageLog = new MessageLog(clock, messages.ok ? toLogEntries(messages.value) : []);

    loggerService.info('Snapshot loaded', { users: directory.size, messages: messageLog.size });
    return { directory, messageLog };
  },

  /**
   * Overwrites both files. Errors propagate: a failed save loses data.
   */
  save: async (directory: Directory, messageLog: MessageLog): Promise<void> => {
    await writeFileAtomic(usersFile, directory.toRecord());
    await writeFileAtomic(messagesFile, messageLog.toRecord());
    loggerService.info('Snapshot saved', { users: directory.size, messages: messageLog.size });
  },
});
