// structured logging with pino - shared with fastify so request logs and domain logs look the same
import pino from 'pino';
import type { Logger } from 'pino';

const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  // card details pass through the config and payment objects, never into logs
  redact: {
    paths: [
      '*.cardNumber',
      '*.cvv',
      '*.payment.cardNumber',
      '*.payment.cvv',
      'Number',
      'SecurityCode',
    ],
    censor: '[redacted]',
  },
});

export const sessionLogger: Logger = logger.child({ module: 'session' });
export const catalogLogger: Logger = logger.child({ module: 'catalog' });
export const auditLogger: Logger = logger.child({ module: 'audit' });
export const orderLogger: Logger = logger.child({ module: 'orders' });
export const storeLogger: Logger = logger.child({ module: 'stores' });
export const vendorLogger: Logger = logger.child({ module: 'vendor' });

export default logger;
