import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';
import { describeError, type NoiseFilterOptions } from '@notestore/note-decoder';

import { ConfigError } from './errors';

export const DEFAULT_DB_PATH = path.join(
  os.homedir(),
  'Library',
  'Group Containers',
  'group.com.apple.notes',
  'NoteStore.sqlite',
);

const DEFAULT_CONFIG_FILENAMES = [
  'notestore.config.json',
  'notestore.config.yaml',
  'notestore.config.yml',
];

const RegExpSourceSchema = z.string().transform((value, ctx) => {
  try {
    return new RegExp(value, 'u');
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid pattern ${JSON.stringify(value)}: ${describeError(err)}`,
    });
    return z.NEVER;
  }
});

const Ratio = z.number().min(0).max(1);

const FallbackConfigSchema = z
  .object({
    minRunLength: z.number().int().min(1).optional(),
    meaningfulLength: z.number().int().min(0).optional(),
    minAlphanumericRatio: Ratio.optional(),
    junkSubstrings: z.array(z.string().min(1)).optional(),
    mojibakeChars: z.array(z.string().length(1)).optional(),
    maxMojibakeRatio: Ratio.optional(),
    shortStringLength: z.number().int().min(0).optional(),
    maxShortPunctuationRatio: Ratio.optional(),
    trailingJunkPatterns: z.array(RegExpSourceSchema).optional(),
  })
  .strict();

const ConfigFileSchema = z
  .object({
    dbPath: z.string().trim().min(1).optional(),
    maxNotes: z.number().int().min(1).optional(),
    fallback: FallbackConfigSchema.optional(),
  })
  .strict();

export interface NoteStoreConfig {
  dbPath: string;
  maxNotes?: number;
  /** Overrides for the heuristics used when a note payload cannot be decoded. */
  fallback?: Partial<NoiseFilterOptions>;
}

function parseMaxNotes(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError('NOTESTORE_MAX_NOTES must be a positive integer when set');
  }
  return parsed;
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

type ConfigFile = z.infer<typeof ConfigFileSchema>;

function readConfigFile(configPath: string): ConfigFile {
  const content = fs.readFileSync(configPath, 'utf8');
  let raw: unknown;
  try {
    raw = configPath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  } catch (err) {
    throw new ConfigError(
      `Config file at ${configPath} could not be parsed: ${describeError(err)}`,
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file at ${configPath}: ${details}`);
  }
  return parsed.data;
}

/**
 * Resolves configuration from NOTESTORE_* environment variables and an optional
 * `notestore.config.{json,yaml,yml}` in `cwd`. Environment values win over the file.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): NoteStoreConfig {
  const configPath = findConfigFile(cwd);
  const fromFile: ConfigFile = configPath ? readConfigFile(configPath) : {};

  const envDbPath = env['NOTESTORE_DB_PATH']?.trim();
  const envMaxNotes = env['NOTESTORE_MAX_NOTES']?.trim();

  const dbPath = envDbPath || fromFile.dbPath || DEFAULT_DB_PATH;
  const maxNotes = envMaxNotes ? parseMaxNotes(envMaxNotes) : fromFile.maxNotes;

  const config: NoteStoreConfig = {
    dbPath: path.resolve(cwd, dbPath),
  };
  if (maxNotes !== undefined) {
    config.maxNotes = maxNotes;
  }
  if (fromFile.fallback) {
    config.fallback = fromFile.fallback;
  }
  return config;
}
