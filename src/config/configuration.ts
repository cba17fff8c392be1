import { readInteger } from './read-integer';

export default () => ({
  database: {
    url: process.env.TURSO_DATABASE_URL || 'file:password-reset.db',
    authToken: process.env.TURSO_AUTH_TOKEN,
    queryTimeout: process.env.DATABASE_QUERY_TIMEOUT || '5s',
  },
  resetToken: {
    ttl: process.env.RESET_TOKEN_TTL || '30m',
    // terminal rows older than this (past expiry) are purged
    retention: process.env.RESET_TOKEN_RETENTION || '7d',
  },
  passwordReset: {
    minResponseMs: readInteger('PASSWORD_RESET_MIN_RESPONSE_MS', 300, 0),
  },
  frontend: {
    url: process.env.FRONTEND_URL || 'http://localhost:5173',
    resetPath: process.env.RESET_PATH || '/reset-password',
  },
  delivery: {
    pollInterval: process.env.DELIVERY_POLL_INTERVAL || '5s',
    batchSize: readInteger('DELIVERY_BATCH_SIZE', 20),
    maxAttempts: readInteger('DELIVERY_MAX_ATTEMPTS', 5),
  },
  plunk: {
    secretKey: process.env.PLUNK_SECRET_KEY,
    fromEmail: process.env.PLUNK_FROM_EMAIL,
  },
  telegram: {
    botToken: process.env.TELEGRAM_BOT_TOKEN,
    apiUrl: process.env.TELEGRAM_API_URL || 'https://api.telegram.org',
    pollUpdates: process.env.TELEGRAM_POLL_UPDATES !== 'false',
    // 0 means short polling
    pollTimeoutSeconds: readInteger('TELEGRAM_POLL_TIMEOUT', 25, 0),
  },
});
