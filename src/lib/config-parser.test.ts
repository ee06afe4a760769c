/**
 * Config Parser Unit Tests
 */
import { describe, expect, it } from 'vitest';
import { CONFIG_DEFAULTS, ConfigError, getConfigStatus, loadAlertConfig } from './config-parser';

const REQUIRED = { GCP_PROJECT: 'test-project', GITHUB_TOKEN: 'test-token' };

describe('Config Parser', () => {
  // ============================================================================
  // 1. Required settings
  // ============================================================================

  describe('required settings', () => {
    it('applies defaults for everything optional', () => {
      const config = loadAlertConfig(REQUIRED);

      expect(config).toEqual({
        projectId: 'test-project',
        region: null,
        services: [],
        repoMap: {},
        defaultRepo: null,
        githubToken: 'test-token',
        githubApiUrl: 'https://api.github.com',
        mentionHandle: 'codex',
        basicAuth: null,
        windowMinutes: 5,
        preTriggerMinutes: 10,
        tailExtraMinutes: 20,
        maxLines: 40,
        maxChars: 20_000,
        pageSize: 100,
        traceScopedErrors: true,
        selfServiceName: null,
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('takes the project id from the first alias that is set', () => {
      const config = loadAlertConfig({ GITHUB_TOKEN: 'test-token', PROJECT_ID: 'p4', GCLOUD_PROJECT: 'p3' });
      expect(config.projectId).toBe('p3');
    });

    it('rejects a missing project id', () => {
      expect(() => loadAlertConfig({ GITHUB_TOKEN: 'test-token' })).toThrow(ConfigError);
    });

    it('rejects a missing or blank GitHub token', () => {
      expect(() => loadAlertConfig({ GCP_PROJECT: 'test-project' })).toThrow('Missing GITHUB_TOKEN');
      expect(() => loadAlertConfig({ GCP_PROJECT: 'test-project', GITHUB_TOKEN: '  ' })).toThrow(ConfigError);
    });
  });

  // ============================================================================
  // 2. Repository map
  // ============================================================================

  describe('REPO_MAP_JSON', () => {
    it('parses a service to repository object', () => {
      const config = loadAlertConfig({ ...REQUIRED, REPO_MAP_JSON: '{"api":"acme/api","web":"acme/web"}' });
      expect(config.repoMap).toEqual({ api: 'acme/api', web: 'acme/web' });
    });

    it('rejects invalid JSON', () => {
      expect(() => loadAlertConfig({ ...REQUIRED, REPO_MAP_JSON: '{api:' })).toThrow(/REPO_MAP_JSON is not valid JSON/);
    });

    it('rejects non-string values', () => {
      expect(() => loadAlertConfig({ ...REQUIRED, REPO_MAP_JSON: '{"api":5}' })).toThrow(
        'REPO_MAP_JSON must be an object of service name to "owner/repo" strings'
      );
    });
  });

  // ============================================================================
  // 3. Tunables
  // ============================================================================

  describe('tunables', () => {
    it('reads positive integers and ignores anything else', () => {
      const config = loadAlertConfig({ ...REQUIRED, WINDOW_MIN: '7', MAX_LINES: '0', PAGE_SIZE: 'abc', MAX_CHARS: '-3' });

      expect(config.windowMinutes).toBe(7);
      expect(config.maxLines).toBe(CONFIG_DEFAULTS.maxLines);
      expect(config.pageSize).toBe(CONFIG_DEFAULTS.pageSize);
      expect(config.maxChars).toBe(CONFIG_DEFAULTS.maxChars);
    });

    it('rejects numbers with trailing characters', () => {
      const config = loadAlertConfig({ ...REQUIRED, WINDOW_MIN: '7m', PRE_MIN: '3.5', PAGE_SIZE: ' 50 ' });

      expect(config.windowMinutes).toBe(CONFIG_DEFAULTS.windowMinutes);
      expect(config.preTriggerMinutes).toBe(CONFIG_DEFAULTS.preTriggerMinutes);
      expect(config.pageSize).toBe(50);
    });

    it('splits the service allowlist', () => {
      expect(loadAlertConfig({ ...REQUIRED, CLOUD_RUN_SERVICES: ' api, web ,,' }).services).toEqual(['api', 'web']);
    });

    it('reads the trace scoping flag', () => {
      expect(loadAlertConfig({ ...REQUIRED, TRACE_SCOPED_ERRORS: 'false' }).traceScopedErrors).toBe(false);
      expect(loadAlertConfig({ ...REQUIRED, TRACE_SCOPED_ERRORS: '0' }).traceScopedErrors).toBe(false);
      expect(loadAlertConfig({ ...REQUIRED, TRACE_SCOPED_ERRORS: 'maybe' }).traceScopedErrors).toBe(true);
    });

    it('normalizes the API URL and mention handle', () => {
      const config = loadAlertConfig({
        ...REQUIRED,
        GITHUB_API_URL: 'https://ghe.test/api/v3/',
        CODEX_HANDLE: '@review-bot',
      });

      expect(config.githubApiUrl).toBe('https://ghe.test/api/v3');
      expect(config.mentionHandle).toBe('review-bot');
    });

    it('enables basic auth when either credential is set', () => {
      expect(loadAlertConfig({ ...REQUIRED, WEBHOOK_USER: 'hook' }).basicAuth).toEqual({
        username: 'hook',
        password: '',
      });
      expect(loadAlertConfig({ ...REQUIRED, WEBHOOK_USER: 'hook', WEBHOOK_PASS: 'test-pass' }).basicAuth).toEqual({
        username: 'hook',
        password: 'test-pass',
      });
    });

    it('records the Cloud Run service identity', () => {
      expect(loadAlertConfig({ ...REQUIRED, K_SERVICE: 'alert-hook' }).selfServiceName).toBe('alert-hook');
    });
  });

  // ============================================================================
  // 4. Status view
  // ============================================================================

  describe('getConfigStatus', () => {
    it('reports presence without exposing secrets', () => {
      const status = getConfigStatus(
        loadAlertConfig({ ...REQUIRED, WEBHOOK_USER: 'hook', WEBHOOK_PASS: 'test-pass', DEFAULT_REPO: 'acme/shop' })
      );

      expect(status).toEqual({
        projectId: 'test-project',
        region: 'any',
        services: 0,
        mappedServices: 0,
        defaultRepo: true,
        githubToken: true,
        basicAuth: true,
        traceScopedErrors: true,
        windowMinutes: 5,
        preTriggerMinutes: 10,
      });
    });
  });
});
