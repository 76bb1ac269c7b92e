import createDebug from 'debug';
import type { Debugger } from 'debug';

// Enable with DEBUG=oracles:* (or a single namespace).
export const log = {
  compile: createDebug('oracles:compile'),
  cost: createDebug('oracles:cost'),
  oracle: createDebug('oracles:oracle'),
  config: createDebug('oracles:config'),
} satisfies Record<string, Debugger>;
