import 'dotenv/config';

const DEFAULT_OWNER = 'global';

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  notes: {
    // empty means "not configured"; handlers refuse to touch the store in that case
    tableName: (process.env.NOTES_TABLE_NAME ?? '').trim(),
    owner: (process.env.NOTES_OWNER ?? '').trim() || DEFAULT_OWNER,
  },
  store: {
    backend: process.env.NOTES_STORE || 'redis',
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    dynamodb: {
      region: process.env.AWS_REGION || undefined,
      endpoint: process.env.DYNAMODB_ENDPOINT || undefined,
    },
  },
};

/** The slice of configuration every handler receives explicitly. */
export interface NotesConfig {
  tableName: string;
  owner: string;
}
