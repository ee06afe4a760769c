import { describe, expect, it, vi } from 'vitest';
import { GitHubClient, MAX_ERROR_BODY_CHARS, TicketingApiError } from './github-client';

const SLUG = { owner: 'acme', repo: 'shop' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createClient(respond: () => Promise<Response>) {
  const fetchImpl = vi.fn<typeof fetch>(respond);
  const client = new GitHubClient({ token: 'test-token', apiUrl: 'https://github.test', fetchImpl });
  return { client, fetchImpl };
}

describe('GitHubClient.findLatestItem', () => {
  it('asks for the most recently updated pull request', async () => {
    const { client, fetchImpl } = createClient(async () => jsonResponse([{ number: 42, title: 'Fix cart' }]));

    await expect(client.findLatestItem(SLUG)).resolves.toBe(42);
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://github.test/repos/acme/shop/pulls?state=all&per_page=1&sort=updated&direction=desc',
      {
        method: 'GET',
        headers: {
          Authorization: 'Bearer test-token',
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        body: undefined,
      }
    );
  });

  it('returns null for a repository without pull requests', async () => {
    const { client } = createClient(async () => jsonResponse([]));
    await expect(client.findLatestItem(SLUG)).resolves.toBeNull();
  });

  it('raises the status and body of a failed call', async () => {
    const { client } = createClient(async () => new Response('Not Found', { status: 404 }));

    const error = await client.findLatestItem(SLUG).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TicketingApiError);
    expect(error).toMatchObject({
      status: 404,
      body: 'Not Found',
      message: 'GitHub API error (404) on GET /repos/acme/shop/pulls?state=all&per_page=1&sort=updated&direction=desc',
    });
  });

  it('clips long error bodies', async () => {
    const { client } = createClient(async () => new Response('e'.repeat(1000), { status: 502 }));

    const error = await client.findLatestItem(SLUG).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TicketingApiError);
    expect(error).toMatchObject({ status: 502, body: 'e'.repeat(MAX_ERROR_BODY_CHARS) });
  });

  it('wraps network failures without a status', async () => {
    const { client } = createClient(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await client.findLatestItem(SLUG).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TicketingApiError);
    expect(error).toMatchObject({ status: null, body: '', message: 'GitHub request failed: fetch failed' });
  });
});

describe('GitHubClient.postComment', () => {
  it('posts the body as JSON and returns the permalink', async () => {
    const { client, fetchImpl } = createClient(async () =>
      jsonResponse({ id: 1, html_url: 'https://github.test/acme/shop/pull/42#issuecomment-1' }, 201)
    );

    await expect(client.postComment(SLUG, 42, 'hello')).resolves.toBe(
      'https://github.test/acme/shop/pull/42#issuecomment-1'
    );
    expect(fetchImpl).toHaveBeenCalledWith('https://github.test/repos/acme/shop/issues/42/comments', {
      method: 'POST',
      headers: {
        Authorization: 'Bearer test-token',
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
        'Content-Type': 'application/json',
      },
      body: '{"body":"hello"}',
    });
  });

  it('returns null when the response has no permalink', async () => {
    const { client } = createClient(async () => jsonResponse({ id: 1 }, 201));
    await expect(client.postComment(SLUG, 42, 'hello')).resolves.toBeNull();
  });

  it('uses the global fetch when none is injected', async () => {
    const spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse([{ number: 3 }]));
    const client = new GitHubClient({ token: 'test-token', apiUrl: 'https://github.test' });

    await expect(client.findLatestItem(SLUG)).resolves.toBe(3);
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });
});
