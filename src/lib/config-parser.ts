/**
 * Config Parser
 *
 * Reads the process environment once at startup and returns a frozen
 * `AlertConfig`. Components receive the config by reference and never
 * touch `process.env` themselves.
 */

import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Accepted aliases for the project id, in priority order */
export const PROJECT_ID_KEYS = ['GCP_PROJECT', 'GOOGLE_CLOUD_PROJECT', 'GCLOUD_PROJECT', 'PROJECT_ID'] as const;

export const CONFIG_DEFAULTS = {
  githubApiUrl: 'https://api.github.com',
  mentionHandle: 'codex',
  windowMinutes: 5,
  preTriggerMinutes: 10,
  tailExtraMinutes: 20,
  maxLines: 40,
  maxChars: 20_000,
  pageSize: 100,
  traceScopedErrors: true,
} as const;

export interface AlertConfig {
  readonly projectId: string;
  readonly region: string | null;
  readonly services: readonly string[];
  readonly repoMap: Readonly<Record<string, string>>;
  readonly defaultRepo: string | null;
  readonly githubToken: string;
  readonly githubApiUrl: string;
  readonly mentionHandle: string;
  readonly basicAuth: { readonly username: string; readonly password: string } | null;
  /** Half-width of the symmetric window around the incident, minutes */
  readonly windowMinutes: number;
  /** Width of the tail window that ends at the trigger, minutes */
  readonly preTriggerMinutes: number;
  /** Extra minutes added to the start of the last tail fallback stage */
  readonly tailExtraMinutes: number;
  readonly maxLines: number;
  readonly maxChars: number;
  readonly pageSize: number;
  readonly traceScopedErrors: boolean;
  /** Cloud Run service identity of this process (K_SERVICE) */
  readonly selfServiceName: string | null;
}

type Env = Record<string, string | undefined>;

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

function positiveInt(fallback: number) {
  return z
    .string()
    .optional()
    .transform((raw) => {
      const trimmed = raw?.trim();
      if (!trimmed || !/^\d+$/.test(trimmed)) return fallback;
      const parsed = Number.parseInt(trimmed, 10);
      return parsed > 0 ? parsed : fallback;
    });
}

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      const normalized = raw?.trim().toLowerCase();
      if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
      if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
      return fallback;
    });

const serviceList = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? '')
      .split(',')
      .map((value) => value.trim())
      .filter(Boolean)
  );

const RepoMapSchema = z.record(z.string(), z.string().trim().min(1));

const EnvSchema = z.object({
  REGION: optionalText,
  CLOUD_RUN_SERVICES: serviceList,
  REPO_MAP_JSON: optionalText,
  DEFAULT_REPO: optionalText,
  GITHUB_TOKEN: optionalText,
  GITHUB_API_URL: optionalText,
  CODEX_HANDLE: optionalText,
  WEBHOOK_USER: optionalText,
  WEBHOOK_PASS: optionalText,
  WINDOW_MIN: positiveInt(CONFIG_DEFAULTS.windowMinutes),
  PRE_MIN: positiveInt(CONFIG_DEFAULTS.preTriggerMinutes),
  TAIL_EXTRA_MIN: positiveInt(CONFIG_DEFAULTS.tailExtraMinutes),
  MAX_LINES: positiveInt(CONFIG_DEFAULTS.maxLines),
  MAX_CHARS: positiveInt(CONFIG_DEFAULTS.maxChars),
  PAGE_SIZE: positiveInt(CONFIG_DEFAULTS.pageSize),
  TRACE_SCOPED_ERRORS: booleanFlag(CONFIG_DEFAULTS.traceScopedErrors),
  K_SERVICE: optionalText,
});

function resolveProjectId(env: Env): string | null {
  for (const key of PROJECT_ID_KEYS) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return null;
}

function parseRepoMap(raw: string | null): Record<string, string> {
  if (!raw) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`REPO_MAP_JSON is not valid JSON: ${reason}`);
  }

  const result = RepoMapSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError('REPO_MAP_JSON must be an object of service name to "owner/repo" strings');
  }
  return result.data;
}

/**
 * Build the immutable configuration from an environment map.
 *
 * @throws ConfigError when the project id or GitHub token is absent, or the
 *   repository map cannot be parsed
 */
export function loadAlertConfig(env: Env = process.env): AlertConfig {
  const projectId = resolveProjectId(env);
  if (!projectId) {
    throw new ConfigError(`Missing project id: set one of ${PROJECT_ID_KEYS.join(', ')}`);
  }

  const parsed = EnvSchema.parse(env);
  if (!parsed.GITHUB_TOKEN) {
    throw new ConfigError('Missing GITHUB_TOKEN');
  }

  const basicAuth =
    parsed.WEBHOOK_USER || parsed.WEBHOOK_PASS
      ? Object.freeze({ username: parsed.WEBHOOK_USER ?? '', password: parsed.WEBHOOK_PASS ?? '' })
      : null;

  return Object.freeze({
    projectId,
    region: parsed.REGION,
    services: Object.freeze([...parsed.CLOUD_RUN_SERVICES]),
    repoMap: Object.freeze(parseRepoMap(parsed.REPO_MAP_JSON)),
    defaultRepo: parsed.DEFAULT_REPO,
    githubToken: parsed.GITHUB_TOKEN,
    githubApiUrl: (parsed.GITHUB_API_URL ?? CONFIG_DEFAULTS.githubApiUrl).replace(/\/+$/, ''),
    mentionHandle: (parsed.CODEX_HANDLE ?? CONFIG_DEFAULTS.mentionHandle).replace(/^@/, ''),
    basicAuth,
    windowMinutes: parsed.WINDOW_MIN,
    preTriggerMinutes: parsed.PRE_MIN,
    tailExtraMinutes: parsed.TAIL_EXTRA_MIN,
    maxLines: parsed.MAX_LINES,
    maxChars: parsed.MAX_CHARS,
    pageSize: parsed.PAGE_SIZE,
    traceScopedErrors: parsed.TRACE_SCOPED_ERRORS,
    selfServiceName: parsed.K_SERVICE,
  });
}

/**
 * Presence-only view of the configuration for /health (no secrets).
 */
export function getConfigStatus(config: AlertConfig) {
  return {
    projectId: config.projectId,
    region: config.region ?? 'any',
    services: config.services.length,
    mappedServices: Object.keys(config.repoMap).length,
    defaultRepo: config.defaultRepo !== null,
    githubToken: config.githubToken.length > 0,
    basicAuth: config.basicAuth !== null,
    traceScopedErrors: config.traceScopedErrors,
    windowMinutes: config.windowMinutes,
    preTriggerMinutes: config.preTriggerMinutes,
  };
}
