/**
 * Incident Correlator
 *
 * Turns the webhook payload into hints and windows, links the request and
 * container-error queries through a trace token, and picks the repository
 * the report belongs to.
 */

import { z } from 'zod';
import { SERVICE_NAME } from '../../lib/app-info';
import { fromEpochSeconds, windowAround } from '../log-query/time-window';
import type { CanonicalLogRecord, FilterScope, TimeWindow } from '../log-query/types';

// ============================================================================
// Incident hints
// ============================================================================

export interface IncidentHint {
  /** Epoch seconds */
  readonly startedAt: number;
  readonly serviceName: string | null;
  readonly region: string | null;
}

const looseString = z.string().trim().min(1).optional().catch(undefined);

/** Largest `Date` value (8.64e15 ms) less a year kept free for window offsets */
export const MAX_STARTED_AT_SECONDS = 8.64e12 - 366 * 86_400;

const epochSeconds = z
  .union([z.number(), z.string().trim().regex(/^\d+(\.\d+)?$/).transform(Number)])
  .refine((value) => Number.isFinite(value) && value > 0 && value <= MAX_STARTED_AT_SECONDS)
  .optional()
  .catch(undefined);

/** Monitoring incident body; every field optional, wrong types are dropped */
export const IncidentPayloadSchema = z.object({
  incident: z
    .object({
      started_at: epochSeconds,
      resource_name: looseString,
      resource: z
        .object({
          labels: z
            .object({
              service_name: looseString,
              location: looseString,
            })
            .optional()
            .catch(undefined),
        })
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
});

const RESOURCE_PATH_PATTERN = /\/locations\/([^/]+)\/services\/([^/]+)/;

/**
 * Labels on the incident resource win; otherwise the resource name path
 * `.../locations/{region}/services/{service}/...` is parsed.
 */
export function extractIncidentHint(payload: unknown, nowMs: number = Date.now()): IncidentHint {
  const parsed = IncidentPayloadSchema.safeParse(payload);
  const incident = parsed.success ? parsed.data.incident : undefined;

  const labels = incident?.resource?.labels;
  const pathMatch = incident?.resource_name?.match(RESOURCE_PATH_PATTERN);

  return Object.freeze({
    startedAt: Math.floor(incident?.started_at ?? nowMs / 1000),
    serviceName: labels?.service_name ?? pathMatch?.[2] ?? null,
    region: labels?.location ?? pathMatch?.[1] ?? null,
  });
}

/**
 * A hinted value replaces the configured one for its dimension; with no
 * hint the configured constraint (possibly none) applies.
 */
export function resolveFilterScope(
  hint: IncidentHint,
  defaults: { region: string | null; services: readonly string[] }
): FilterScope {
  return Object.freeze({
    region: hint.region ?? defaults.region,
    services: hint.serviceName ? [hint.serviceName] : [...defaults.services],
  });
}

// ============================================================================
// Windows
// ============================================================================

/** `startedAt ± halfWidthMinutes` */
export function primaryWindow(startedAt: number, halfWidthMinutes: number): TimeWindow {
  return windowAround(fromEpochSeconds(startedAt), halfWidthMinutes, halfWidthMinutes);
}

/** `[startedAt - preMinutes, startedAt]`, ends exactly at the trigger */
export function preTriggerWindow(startedAt: number, preMinutes: number): TimeWindow {
  return windowAround(fromEpochSeconds(startedAt), preMinutes, 0);
}

// ============================================================================
// Trace correlation
// ============================================================================

/** First record, in store order, that carries a trace token */
export function pickTraceToken(records: readonly CanonicalLogRecord[]): string | null {
  for (const record of records) {
    if (record.trace) return record.trace;
  }
  return null;
}

// ============================================================================
// Services
// ============================================================================

function sortedUnique(values: Iterable<string | null | undefined>): string[] {
  const set = new Set<string>();
  for (const value of values) {
    if (value) set.add(value);
  }
  return [...set].sort();
}

/** Services that actually appear in the logs, plus the hinted one */
export function collectObservedServices(
  recordSets: ReadonlyArray<readonly CanonicalLogRecord[]>,
  hint: IncidentHint
): string[] {
  return sortedUnique([...recordSets.flat().map((record) => record.service), hint.serviceName]);
}

export interface ServicesSeenInput {
  recordSets: ReadonlyArray<readonly CanonicalLogRecord[]>;
  hint: IncidentHint;
  allowlist: readonly string[];
  selfServiceName: string | null;
}

/**
 * Candidate services for repository lookup: observed, hinted, configured,
 * this process's own Cloud Run service, and the fixed self identifier.
 */
export function collectServicesSeen(input: ServicesSeenInput): string[] {
  return sortedUnique([
    ...collectObservedServices(input.recordSets, input.hint),
    ...input.allowlist,
    input.selfServiceName,
    SERVICE_NAME,
  ]);
}

// ============================================================================
// Repository selection
// ============================================================================

export const PLACEHOLDER_REPOS: readonly string[] = [
  'owner/repo',
  'org/repo',
  'owner/name',
  'your-org/your-repo',
  'changeme',
];

export function isPlaceholderRepo(slug: string): boolean {
  const normalized = slug.trim().toLowerCase();
  return PLACEHOLDER_REPOS.includes(normalized);
}

export interface RepoSlug {
  owner: string;
  repo: string;
}

const SLUG_PATTERN = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/;
const DOTS_ONLY = /^\.+$/;

/** `owner/repo`; segments made only of dots are path traversal, not names */
export function parseRepoSlug(slug: string): RepoSlug | null {
  const match = slug.trim().match(SLUG_PATTERN);
  if (!match || DOTS_ONLY.test(match[1]) || DOTS_ONLY.test(match[2])) return null;
  return { owner: match[1], repo: match[2] };
}

export type RepositoryChoice =
  | { kind: 'mapped'; slug: string; service: string }
  | { kind: 'default'; slug: string }
  | { kind: 'none' };

/** First service (in list order) present in the map wins, then the default */
export function chooseRepository(
  services: readonly string[],
  repoMap: Readonly<Record<string, string>>,
  defaultRepo: string | null
): RepositoryChoice {
  for (const service of services) {
    const slug = Object.hasOwn(repoMap, service) ? repoMap[service] : undefined;
    if (slug) return { kind: 'mapped', slug, service };
  }
  return defaultRepo ? { kind: 'default', slug: defaultRepo } : { kind: 'none' };
}
