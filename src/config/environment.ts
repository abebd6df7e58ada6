/**
 * Environment configuration for the notifier
 * Loads and validates environment variables (dotenv is applied by the runner)
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { parseLogLevel, type LogLevel } from '../utils/logger';

export type DirectorySourceKind = 'csv' | 'slack';
export type MentionResolverKind = 'table' | 'fuzzy';
export type UnmatchedMentionStyle = 'verbatim' | 'lowercase';
export type EmailFailurePolicy = 'abort' | 'count';

export interface EnvironmentConfig {
  zotero: {
    apiKey: string;
    libraryId: string;
    libraryType: 'group' | 'user';
    pageSize: number;
  };
  slack: {
    token?: string;
  };
  state: {
    filePath: string;
  };
  mentions: {
    directorySource: DirectorySourceKind;
    directoryCsvUrl?: string;
    resolver: MentionResolverKind;
    unmatched: UnmatchedMentionStyle;
  };
  delivery: {
    retryMaxAttempts: number;
    retryBaseDelayMs: number;
    postDelayMs: number;
    noteFetchDelayMs: number;
  };
  email: {
    host: string;
    port: number;
    user?: string;
    password?: string;
    from?: string;
    recipients: string[];
    failurePolicy: EmailFailurePolicy;
  };
  logging: {
    level: LogLevel;
    filePath?: string;
  };
  dryRun: boolean;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const booleanFlag = z
  .string()
  .optional()
  .transform(value => value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase()));

const environmentSchema = z.object({
  ZOTERO_API_KEY: z.string().trim().min(1, 'ZOTERO_API_KEY is required'),
  ZOTERO_LIBRARY_ID: z.string().trim().min(1, 'ZOTERO_LIBRARY_ID is required'),
  ZOTERO_LIBRARY_TYPE: z.enum(['group', 'user']).default('group'),
  ZOTERO_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  SLACK_BOT_TOKEN: optionalString,
  STATE_FILE_PATH: z.string().trim().min(1).default('state.csv'),
  DIRECTORY_SOURCE: z.enum(['csv', 'slack']).default('csv'),
  DIRECTORY_CSV_URL: optionalString.pipe(z.string().url().optional()),
  MENTION_RESOLVER: z.enum(['table', 'fuzzy']).default('table'),
  UNMATCHED_MENTIONS: z.enum(['verbatim', 'lowercase']).default('verbatim'),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  POST_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  NOTE_FETCH_DELAY_MS: z.coerce.number().int().min(0).default(250),
  SMTP_HOST: z.string().trim().min(1).default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  EMAIL_FROM: optionalString,
  EMAIL_RECIPIENTS: z
    .string()
    .optional()
    .transform(value =>
      (value ?? '')
        .split(',')
        .map(address => address.trim())
        .filter(address => address.length > 0)
    )
    .pipe(z.array(z.string().email())),
  EMAIL_FAILURE_POLICY: z.enum(['abort', 'count']).default('abort'),
  LOG_LEVEL: z.string().optional(),
  LOG_FILE: z.string().optional(),
  DRY_RUN: booleanFlag
});

/**
 * Load and validate environment configuration
 * @throws ConfigurationError listing every missing or invalid variable
 */
export function loadEnvironmentConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { dryRun?: boolean; stateFilePath?: string } = {}
): EnvironmentConfig {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid environment configuration', issues);
  }

  const vars = parsed.data;
  const dryRun = overrides.dryRun ?? vars.DRY_RUN;

  const missing: string[] = [];
  if (!dryRun && !vars.SLACK_BOT_TOKEN) {
    missing.push('SLACK_BOT_TOKEN is required unless running dry');
  }
  if (vars.DIRECTORY_SOURCE === 'csv' && !vars.DIRECTORY_CSV_URL && !dryRun) {
    missing.push('DIRECTORY_CSV_URL is required when DIRECTORY_SOURCE=csv');
  }
  if (vars.DIRECTORY_SOURCE === 'slack' && !vars.SLACK_BOT_TOKEN) {
    missing.push('SLACK_BOT_TOKEN is required when DIRECTORY_SOURCE=slack');
  }
  if (vars.EMAIL_RECIPIENTS.length > 0 && !dryRun && (!vars.SMTP_USER || !vars.SMTP_PASSWORD)) {
    missing.push('SMTP_USER and SMTP_PASSWORD are required when EMAIL_RECIPIENTS is set');
  }
  if (missing.length > 0) {
    throw new ConfigurationError('Missing required configuration', missing);
  }

  return {
    zotero: {
      apiKey: vars.ZOTERO_API_KEY,
      libraryId: vars.ZOTERO_LIBRARY_ID,
      libraryType: vars.ZOTERO_LIBRARY_TYPE,
      pageSize: vars.ZOTERO_PAGE_SIZE
    },
    slack: {
      token: vars.SLACK_BOT_TOKEN
    },
    state: {
      filePath: overrides.stateFilePath ?? vars.STATE_FILE_PATH
    },
    mentions: {
      directorySource: vars.DIRECTORY_SOURCE,
      directoryCsvUrl: vars.DIRECTORY_CSV_URL,
      resolver: vars.MENTION_RESOLVER,
      unmatched: vars.UNMATCHED_MENTIONS
    },
    delivery: {
      retryMaxAttempts: vars.RETRY_MAX_ATTEMPTS,
      retryBaseDelayMs: vars.RETRY_BASE_DELAY_MS,
      postDelayMs: vars.POST_DELAY_MS,
      noteFetchDelayMs: vars.NOTE_FETCH_DELAY_MS
    },
    email: {
      host: vars.SMTP_HOST,
      port: vars.SMTP_PORT,
      user: vars.SMTP_USER,
      password: vars.SMTP_PASSWORD,
      from: vars.EMAIL_FROM ?? vars.SMTP_USER,
      recipients: vars.EMAIL_RECIPIENTS,
      failurePolicy: vars.EMAIL_FAILURE_POLICY
    },
    logging: {
      level: parseLogLevel(vars.LOG_LEVEL),
      filePath: vars.LOG_FILE === undefined ? 'notifier.log' : vars.LOG_FILE || undefined
    },
    dryRun
  };
}
