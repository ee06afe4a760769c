/**
 * GitHub ticketing client
 *
 * Two calls: the most recently updated pull request of a repository, and a
 * comment on it. Non-2xx responses raise `TicketingApiError`.
 */

import type { RepoSlug } from '../correlation/correlator';

export const MAX_ERROR_BODY_CHARS = 500;

export class TicketingApiError extends Error {
  constructor(
    readonly status: number | null,
    readonly body: string,
    message: string
  ) {
    super(message);
    this.name = 'TicketingApiError';
  }
}

export interface TicketingClient {
  /** Number of the most recently updated pull request, or null when there is none */
  findLatestItem(slug: RepoSlug): Promise<number | null>;
  /** Posts a comment and returns its permalink */
  postComment(slug: RepoSlug, item: number, body: string): Promise<string | null>;
}

export interface GitHubClientOptions {
  token: string;
  apiUrl: string;
  fetchImpl?: typeof fetch;
}

function readField(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null && key in value ? Reflect.get(value, key) : undefined;
}

export class GitHubClient implements TicketingClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GitHubClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async githubFetch(
    path: string,
    init: { method: 'GET' | 'POST'; body?: unknown } = { method: 'GET' }
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.token}`,
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.apiUrl}${path}`, {
        method: init.method,
        headers,
        body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TicketingApiError(null, '', `GitHub request failed: ${reason}`);
    }

    if (!response.ok) {
      const errorText = await response.text().catch((error: unknown) => `<unreadable body: ${String(error)}>`);
      throw new TicketingApiError(
        response.status,
        errorText.slice(0, MAX_ERROR_BODY_CHARS),
        `GitHub API error (${response.status}) on ${init.method} ${path}`
      );
    }

    return response.json();
  }

  async findLatestItem({ owner, repo }: RepoSlug): Promise<number | null> {
    const params = new URLSearchParams({
      state: 'all',
      per_page: '1',
      sort: 'updated',
      direction: 'desc',
    });
    const data = await this.githubFetch(`/repos/${owner}/${repo}/pulls?${params}`);
    if (!Array.isArray(data) || data.length === 0) return null;

    const number = readField(data[0], 'number');
    return typeof number === 'number' ? number : null;
  }

  async postComment({ owner, repo }: RepoSlug, item: number, body: string): Promise<string | null> {
    const data = await this.githubFetch(`/repos/${owner}/${repo}/issues/${item}/comments`, {
      method: 'POST',
      body: { body },
    });
    const htmlUrl = readField(data, 'html_url');
    return typeof htmlUrl === 'string' ? htmlUrl : null;
  }
}
