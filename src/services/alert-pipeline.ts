/**
 * Alert Pipeline
 *
 * One incident, start to finish, strictly in sequence:
 * request anomalies → trace pick → container errors → tail fallback →
 * repository → latest PR → comment.
 *
 * Every failure past the webhook boundary becomes an in-band note; the
 * returned outcome is always acknowledged with `ok: true`.
 */

import type { AlertConfig } from '../lib/config-parser';
import type { Logger } from '../lib/logger';
import {
  chooseRepository,
  collectObservedServices,
  collectServicesSeen,
  extractIncidentHint,
  isPlaceholderRepo,
  parseRepoSlug,
  pickTraceToken,
  preTriggerWindow,
  primaryWindow,
  resolveFilterScope,
  type IncidentHint,
  type RepoSlug,
} from './correlation/correlator';
import { buildContainerErrorFilter, buildRequestAnomalyFilter } from './log-query/filter-builder';
import { buildTailStages, fetchLogs, runFallbackChain } from './log-query/log-fetcher';
import type { LogStore } from './log-query/log-store';
import type { CanonicalLogRecord, TimeWindow } from './log-query/types';
import { buildReportBody } from './report/report-renderer';
import { TicketingApiError, type TicketingClient } from './ticketing/github-client';

export interface AlertPipelineDeps {
  config: AlertConfig;
  logStore: LogStore;
  ticketing: TicketingClient;
  logger: Logger;
  now?: () => number;
}

export interface DownstreamErrorDetail {
  status: number | null;
  body: string;
}

type WithLogErrors = { log_errors?: string[] };

export type AlertOutcome = { ok: true } & WithLogErrors &
  (
    | { repo: string; pr: number; comment_url: string | null }
    | { note: 'no_repo_mapping'; services: string[] }
    | { note: 'bad_repo_slug'; repo: string; services: string[] }
    | { note: 'no_prs_found'; repo: string }
    | { note: 'pr_lookup_failed'; repo: string; detail: DownstreamErrorDetail }
    | { note: 'comment_failed'; repo: string; pr: number; detail: DownstreamErrorDetail }
  );

interface CorrelatedLogs {
  requestRecords: CanonicalLogRecord[];
  errorRecords: CanonicalLogRecord[];
  trace: string | null;
  fallbackStage: string | null;
  logErrors: string[];
}

function toDetail(error: unknown): DownstreamErrorDetail {
  if (error instanceof TicketingApiError) {
    return { status: error.status, body: error.body };
  }
  return { status: null, body: error instanceof Error ? error.message : String(error) };
}

function withLogErrors(logErrors: string[]): WithLogErrors {
  return logErrors.length > 0 ? { log_errors: logErrors } : {};
}

export class AlertPipeline {
  private readonly now: () => number;

  constructor(private readonly deps: AlertPipelineDeps) {
    this.now = deps.now ?? Date.now;
  }

  async handle(payload: unknown): Promise<AlertOutcome> {
    const { config, logger } = this.deps;

    const hint = extractIncidentHint(payload, this.now());
    const window = primaryWindow(hint.startedAt, config.windowMinutes);
    logger.info({ hint, start: window.start.toISOString(), end: window.end.toISOString() }, '[Alert] incident received');

    const logs = await this.correlateLogs(hint, window);
    const logErrors = withLogErrors(logs.logErrors);

    const services = collectServicesSeen({
      recordSets: [logs.requestRecords, logs.errorRecords],
      hint,
      allowlist: config.services,
      selfServiceName: config.selfServiceName,
    });

    const choice = chooseRepository(services, config.repoMap, config.defaultRepo);
    if (choice.kind === 'none') {
      logger.warn({ services }, '[Alert] no repository mapping matched');
      return { ok: true, note: 'no_repo_mapping', services, ...logErrors };
    }

    const slug = isPlaceholderRepo(choice.slug) ? null : parseRepoSlug(choice.slug);
    if (!slug) {
      logger.warn({ repo: choice.slug, services }, '[Alert] repository slug unusable, skipping ticketing');
      return { ok: true, note: 'bad_repo_slug', repo: choice.slug, services, ...logErrors };
    }

    const body = buildReportBody({
      mentionHandle: config.mentionHandle,
      window,
      halfWidthMinutes: config.windowMinutes,
      services: collectObservedServices([logs.requestRecords, logs.errorRecords], hint),
      requestRecords: logs.requestRecords,
      errorRecords: logs.errorRecords,
      trace: logs.trace,
      fallbackStage: logs.fallbackStage,
      logErrors: logs.logErrors,
      maxLines: config.maxLines,
      maxChars: config.maxChars,
      rawPayload: payload,
    });

    return { ...(await this.deliver(choice.slug, slug, body)), ...logErrors };
  }

  /**
   * Request anomalies first; their first trace scopes the error query when
   * enabled. An empty error result falls through to the tail stages.
   */
  private async correlateLogs(hint: IncidentHint, window: TimeWindow): Promise<CorrelatedLogs> {
    const { config, logStore, logger } = this.deps;
    const scope = resolveFilterScope(hint, config);
    const logErrors: string[] = [];

    const requests = await fetchLogs(logStore, buildRequestAnomalyFilter(scope), window, config.pageSize, logger);
    if (requests.error) logErrors.push(`request anomalies: ${requests.error}`);

    const trace = config.traceScopedErrors ? pickTraceToken(requests.records) : null;
    const errors = await fetchLogs(logStore, buildContainerErrorFilter(scope, trace), window, config.pageSize, logger);
    if (errors.error) logErrors.push(`container errors: ${errors.error}`);

    if (errors.error || errors.records.length > 0) {
      return { requestRecords: requests.records, errorRecords: errors.records, trace, fallbackStage: null, logErrors };
    }

    const tail = await runFallbackChain(
      logStore,
      buildTailStages(scope, {
        window: preTriggerWindow(hint.startedAt, config.preTriggerMinutes),
        extraMinutes: config.tailExtraMinutes,
        pageSize: config.pageSize,
      }),
      logger
    );
    if (tail.error) logErrors.push(`${tail.stage ?? 'tail'}: ${tail.error}`);

    return {
      requestRecords: requests.records,
      errorRecords: tail.records,
      trace,
      fallbackStage: tail.records.length > 0 ? tail.stage : null,
      logErrors,
    };
  }

  private async deliver(
    repo: string,
    slug: RepoSlug,
    body: string
  ): Promise<AlertOutcome> {
    const { ticketing, logger } = this.deps;

    let pr: number | null;
    try {
      pr = await ticketing.findLatestItem(slug);
    } catch (error) {
      logger.warn({ err: error, repo }, '[Alert] pull request lookup failed');
      return { ok: true, note: 'pr_lookup_failed', repo, detail: toDetail(error) };
    }

    if (pr === null) {
      logger.warn({ repo }, '[Alert] no pull requests to comment on');
      return { ok: true, note: 'no_prs_found', repo };
    }

    try {
      const commentUrl = await ticketing.postComment(slug, pr, body);
      logger.info({ repo, pr, commentUrl }, '[Alert] report posted');
      return { ok: true, repo, pr, comment_url: commentUrl };
    } catch (error) {
      logger.warn({ err: error, repo, pr }, '[Alert] comment post failed');
      return { ok: true, note: 'comment_failed', repo, pr, detail: toDetail(error) };
    }
  }
}
