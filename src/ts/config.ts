import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

import { ConfigurationError } from './errors';
import { log } from './log';

/**
 * Widest packed register a function form may declare. Packed inputs and
 * outputs are manipulated with 32-bit bitwise operators.
 */
export const MAX_REGISTER_BITS = 30;

/** Governs whether and how a callable form may be enumerated into a table. */
export type SynthConfig = {
  readonly maxTruthTableInputBits: number;
  readonly allowCallableEnumeration: boolean;
};

export const DEFAULT_SYNTH_CONFIG: SynthConfig = Object.freeze({
  maxTruthTableInputBits: 12,
  allowCallableEnumeration: true,
});

export function synthConfig(overrides: Partial<SynthConfig> = {}): SynthConfig {
  const config = { ...DEFAULT_SYNTH_CONFIG, ...overrides };
  const bits = config.maxTruthTableInputBits;

  if (!Number.isInteger(bits) || bits < 0 || bits > MAX_REGISTER_BITS) {
    throw new ConfigurationError(
      `maxTruthTableInputBits must be an integer in [0, ${MAX_REGISTER_BITS}], got ${bits}`
    );
  }

  return Object.freeze(config);
}

/**
 * Reads `.env` from the working directory into `process.env` when the file
 * exists. Variables already set in the environment win.
 */
export function loadEnvFile(envPath = path.resolve(process.cwd(), '.env')): void {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    log.config('loaded %s', envPath);
  }
}

/**
 * Builds a `SynthConfig` from environment variables:
 *
 *   ORACLE_MAX_TRUTH_TABLE_INPUT_BITS   integer ceiling on enumerated inputs
 *   ORACLE_ALLOW_CALLABLE_ENUMERATION   "true" | "false" | "1" | "0"
 *
 * Without an explicit `env` the `.env` file is loaded first and
 * `process.env` is read.
 */
export function loadSynthConfig(env?: Record<string, string | undefined>): SynthConfig {
  if (env === undefined) {
    loadEnvFile();
    env = process.env;
  }

  const overrides: { -readonly [K in keyof SynthConfig]?: SynthConfig[K] } = {};

  const rawBits = env.ORACLE_MAX_TRUTH_TABLE_INPUT_BITS;
  if (rawBits !== undefined && rawBits.trim() !== '') {
    if (!/^\d+$/.test(rawBits.trim())) {
      throw new ConfigurationError(
        `ORACLE_MAX_TRUTH_TABLE_INPUT_BITS: expected integer, got "${rawBits}"`
      );
    }
    overrides.maxTruthTableInputBits = Number(rawBits.trim());
  }

  const rawAllow = env.ORACLE_ALLOW_CALLABLE_ENUMERATION;
  if (rawAllow !== undefined && rawAllow.trim() !== '') {
    overrides.allowCallableEnumeration = parseBoolean(rawAllow, 'ORACLE_ALLOW_CALLABLE_ENUMERATION');
  }

  const config = synthConfig(overrides);
  log.config('synth config %o', config);
  return config;
}

function parseBoolean(raw: string, name: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${name}: expected true/false, got "${raw}"`);
  }
}
