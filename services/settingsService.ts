export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerSettings {
  port: number;
  host: string;
  usersFile: string;
  messagesFile: string;
  requireCredentials: boolean;
  bcryptCost: number;
  passwordSalt: string;
}

export interface LogSettings {
  level: LogLevel;
  json: boolean;
}

// Fixed salt and cost shared by every credential; changing either invalidates
// every stored hash.
const DEFAULT_PASSWORD_SALT = 'Hello, world!!!!';
const DEFAULT_BCRYPT_COST = 12;
export const SALT_LENGTH = 16;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const readInteger = (name: string, fallback: number, min: number, max: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got '${raw}'`);
  }
  return value;
};

const readBoolean = (name: string, fallback: boolean): boolean => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new Error(`${name} must be 'true' or 'false', got '${raw}'`);
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const settingsService = {
  getServerSettings: (): ServerSettings => {
    const passwordSalt = process.env.PIGEON_PASSWORD_SALT || DEFAULT_PASSWORD_SALT;
    if (Buffer.byteLength(passwordSalt, 'utf8') !== SALT_LENGTH) {
      throw new Error(`PIGEON_PASSWORD_SALT must be exactly ${SALT_LENGTH} bytes`);
    }

    return {
      port: readInteger('PORT', 3000, 0, 65535),
      host: process.env.HOST || '0.0.0.0',
      usersFile: process.env.PIGEON_USERS_FILE || 'users.json',
      messagesFile: process.env.PIGEON_MESSAGES_FILE || 'messages.json',
      requireCredentials: readBoolean('PIGEON_REQUIRE_CREDENTIALS', true),
      bcryptCost: readInteger('PIGEON_BCRYPT_COST', DEFAULT_BCRYPT_COST, 4, 31),
      passwordSalt,
    };
  },

  getLogSettings: (): LogSettings => {
    const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return {
      level: isLogLevel(raw) ? raw : 'info',
      json: process.env.NODE_ENV === 'production',
    };
  },
};
