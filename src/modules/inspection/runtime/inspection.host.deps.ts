/**
 * Host Dependencies Contract
 *
 * The inspection core reaches its host only through these interfaces: no
 * direct process.env reads, no direct database driver imports outside
 * storage/, no ambient clock.
 */

import { logger as rootLogger } from '../../../common/logger.js';
import type { DefinitionStore } from '../storage/definition.store.js';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export interface Clock {
  now: () => number;
}

export interface InspectionHostDeps {
  logger: Logger;
  clock: Clock;
  store: DefinitionStore;
  newRunId: () => string;
}

export const defaultLogger: Logger = rootLogger.child({ module: 'inspection' });

export const defaultClock: Clock = {
  now: () => Date.now(),
};
