import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { resolveLogLevel } from './logger.js';

export const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

export const DEFAULT_CONFIG_PATH = join(homedir(), '.grid-sentiment', 'config.yaml');
export const DEFAULT_DB_PATH = '~/.grid-sentiment/observations.sqlite';

const WEIGHT_TOLERANCE = 1e-9;

const WeightsSchema = z
  .object({
    price: z.number().min(0).default(0.5),
    load: z.number().min(0).default(0.5),
  })
  .refine((weights) => Math.abs(weights.price + weights.load - 1) <= WEIGHT_TOLERANCE, {
    message: 'scoring.weights.price + scoring.weights.load must equal 1',
  });

const ConfigSchema = z.object({
  storage: z
    .object({
      dbPath: z.string().default(DEFAULT_DB_PATH),
    })
    .default({}),
  collector: z
    .object({
      lookbackHours: z.number().int().positive().default(48),
    })
    .default({}),
  scoring: z
    .object({
      // Trailing window, excluding the hour being scored.
      windowHours: z.number().int().positive().default(168),
      minSamples: z.number().int().positive().default(24),
      // MAD -> standard deviation under normality.
      madScale: z.number().positive().default(1.4826),
      minSpread: z
        .object({
          price: z.number().positive().default(1),
          load: z.number().positive().default(100),
        })
        .default({}),
      steepness: z.number().positive().default(1),
      weights: WeightsSchema.default({}),
    })
    .default({}),
  query: z
    .object({
      maxHistoryHours: z.number().int().positive().default(336),
    })
    .default({}),
  zones: z
    .object({
      aliases: z.record(z.string()).default({}),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type ScoringConfig = AppConfig['scoring'];

export function parseConfig(raw: unknown): AppConfig {
  const cfg = ConfigSchema.parse(raw ?? {});
  cfg.storage.dbPath = expandHome(cfg.storage.dbPath);
  return cfg;
}

function applyEnvOverrides(cfg: AppConfig): AppConfig {
  const envDbPath = process.env.GRID_SENTIMENT_DB_PATH;
  if (envDbPath) {
    cfg.storage.dbPath = expandHome(envDbPath);
  }

  const envLookback = process.env.GRID_SENTIMENT_LOOKBACK_HOURS;
  if (envLookback) {
    const hours = Number(envLookback);
    if (Number.isInteger(hours) && hours > 0) {
      cfg.collector.lookbackHours = hours;
    }
  }

  const envLevel = process.env.GRID_SENTIMENT_LOG_LEVEL;
  if (envLevel) {
    cfg.logging.level = resolveLogLevel(envLevel, cfg.logging.level);
  }

  return cfg;
}

/**
 * Load configuration from YAML. The default location is optional; an explicitly requested
 * file that does not exist is an error.
 */
export function loadConfig(configPath?: string): AppConfig {
  const explicit = configPath ?? process.env.GRID_SENTIMENT_CONFIG_PATH;
  const path = explicit ? expandHome(explicit) : DEFAULT_CONFIG_PATH;

  if (!explicit && !existsSync(path)) {
    return applyEnvOverrides(parseConfig({}));
  }

  const raw = readFileSync(path, 'utf-8');
  const parsed: unknown = yaml.parse(raw) ?? {};
  return applyEnvOverrides(parseConfig(parsed));
}
