import * as fs from 'fs';
import * as path from 'path';

import * as dotenv from 'dotenv';

// Find the monorepo root by looking for package.json with workspaces
function findMonorepoRoot(): string {
  let currentDir = process.cwd();

  while (currentDir !== path.parse(currentDir).root) {
    const packageJsonPath = path.join(currentDir, 'package.json');

    if (fs.existsSync(packageJsonPath)) {
      try {
        const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
        // Check if this is the monorepo root (has workspaces)
        if (typeof packageJson === 'object' && packageJson !== null && 'workspaces' in packageJson) {
          return currentDir;
        }
      } catch {
        // Continue searching if package.json is invalid
      }
    }

    currentDir = path.dirname(currentDir);
  }

  // Fallback to process.cwd() if no monorepo root found
  return process.cwd();
}

export const MONOREPO_ROOT = findMonorepoRoot();

dotenv.config({ path: path.resolve(MONOREPO_ROOT, '.env') });

/** Nominal weight of one cement bag in kilograms */
export const NOMINAL_BAG_WEIGHT_KG = 50.0;

export const DEFAULT_EXPECTED_SENDER = 'weighbridge@example.com';

/**
 * Each group must match the subject; within a group any one alternative is
 * enough, and an alternative matches when all of its words are present.
 */
export const DEFAULT_SUBJECT_KEYWORD_GROUPS: string[][] = [
  ['weigh bridge', 'weighbridge'],
  ['report', 'repot'],
];

export interface SyncHeuristicsConfig {
  expectedSender: string;
  /** Substrings accepted as the sender when the exact address is not exposed */
  senderAliases: string[];
  subjectKeywordGroups: string[][];
  nominalBagWeight: number;
}

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  isDevelopment: boolean;
  api: {
    port: number;
    host: string;
  };
  database: {
    path: string;
  };
  messageSource: {
    path: string;
  };
  sync: SyncHeuristicsConfig;
  sentry: {
    dsn?: string;
    enabled: boolean;
    environment?: string;
    tracesSampleRate?: number;
  };
  logging: {
    level: string;
  };
  rateLimit: {
    max: number;
    window: number;
  };
  cors: {
    origin: string;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (!value && !defaultValue) {
    if (process.env.NODE_ENV === 'production') {
      throw new Error(`Missing required environment variable: ${key}`);
    }
    console.warn(`Warning: Missing environment variable: ${key}`);
    return '';
  }
  return value || defaultValue || '';
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function resolveFromRoot(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(MONOREPO_ROOT, filePath);
}

/**
 * Derive sender aliases from an address: the address itself, its local part
 * and its domain.
 *
 * @example
 * deriveSenderAliases('scale@plant.example.com')
 * // ['scale@plant.example.com', 'scale', 'plant.example.com']
 */
export function deriveSenderAliases(address: string): string[] {
  const normalized = address.trim().toLowerCase();
  const at = normalized.indexOf('@');
  if (at <= 0) return normalized ? [normalized] : [];
  return [normalized, normalized.slice(0, at), normalized.slice(at + 1)];
}

/**
 * Parse SUBJECT_KEYWORDS: groups separated by ";", alternatives by "|".
 *
 * @example
 * parseSubjectKeywordGroups('weigh bridge|weighbridge;report|repot')
 * // [['weigh bridge', 'weighbridge'], ['report', 'repot']]
 */
export function parseSubjectKeywordGroups(value: string): string[][] {
  return value
    .split(';')
    .map((group) =>
      group
        .split('|')
        .map((alternative) => alternative.trim().toLowerCase())
        .filter((alternative) => alternative.length > 0)
    )
    .filter((group) => group.length > 0);
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

export function loadConfig(): AppConfig {
  const nodeEnv = getEnvVar('NODE_ENV', 'development');
  const isProduction = nodeEnv === 'production';
  const isDevelopment = nodeEnv === 'development';

  const expectedSender = getEnvVar('EXPECTED_SENDER', DEFAULT_EXPECTED_SENDER).toLowerCase();
  const aliasesEnv = process.env.SENDER_ALIASES;
  const senderAliases = aliasesEnv ? parseList(aliasesEnv) : deriveSenderAliases(expectedSender);

  const subjectKeywordsEnv = process.env.SUBJECT_KEYWORDS;
  const subjectKeywordGroups = subjectKeywordsEnv
    ? parseSubjectKeywordGroups(subjectKeywordsEnv)
    : DEFAULT_SUBJECT_KEYWORD_GROUPS;
  if (subjectKeywordGroups.length === 0) {
    throw new Error('SUBJECT_KEYWORDS must define at least one keyword group');
  }

  const nominalBagWeight = getEnvVarAsNumber('NOMINAL_BAG_WEIGHT', NOMINAL_BAG_WEIGHT_KG);
  if (nominalBagWeight <= 0) {
    throw new Error('NOMINAL_BAG_WEIGHT must be greater than zero');
  }

  return {
    nodeEnv,
    isProduction,
    isDevelopment,
    api: {
      port: getEnvVarAsNumber('PORT_API', 3000),
      host: getEnvVar('HOST_API', '0.0.0.0'),
    },
    database: {
      path: resolveFromRoot(getEnvVar('DATABASE_PATH', './data/weighbridge.db')),
    },
    messageSource: {
      path: resolveFromRoot(getEnvVar('MESSAGE_SOURCE_PATH', './data/messages.json')),
    },
    sync: {
      expectedSender,
      senderAliases,
      subjectKeywordGroups,
      nominalBagWeight,
    },
    sentry: {
      ...(process.env.SENTRY_DSN ? { dsn: process.env.SENTRY_DSN } : {}),
      enabled: !!process.env.SENTRY_DSN,
      environment: nodeEnv,
      tracesSampleRate: getEnvVarAsNumber('SENTRY_TRACES_SAMPLE_RATE', isDevelopment ? 1.0 : 0.1),
    },
    logging: {
      level: getEnvVar('LOG_LEVEL', 'info'),
    },
    rateLimit: {
      max: getEnvVarAsNumber('RATE_LIMIT_MAX', 100),
      window: getEnvVarAsNumber('RATE_LIMIT_WINDOW', 60000),
    },
    cors: {
      origin: getEnvVar('CORS_ORIGIN', 'http://localhost:3001'),
    },
  };
}
