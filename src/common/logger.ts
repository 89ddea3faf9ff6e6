/**
 * Process-wide pino logger for code that runs outside a Fastify request.
 * Inside routes prefer `request.log` / `app.log`, which share the same backend.
 */

import pino from 'pino';
import { env } from '../config/env.js';

export const logger = pino({
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
  base: undefined,
});
