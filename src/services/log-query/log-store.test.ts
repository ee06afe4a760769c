import { Entry } from '@google-cloud/logging';
import type { GetEntriesRequest } from '@google-cloud/logging/build/src/log';
import { describe, expect, it, vi } from 'vitest';
import { CloudLoggingStore, type EntriesSource } from './log-store';

function createSource(entries: Entry[]) {
  const getEntries = vi.fn(async (_request: GetEntriesRequest): Promise<[Entry[], ...unknown[]]> => [entries, null, {}]);
  const source: EntriesSource = { getEntries };
  return { source, getEntries };
}

describe('CloudLoggingStore', () => {
  it('asks for one page, newest first, in the configured project', async () => {
    const { source, getEntries } = createSource([new Entry({}, 'one')]);
    const store = new CloudLoggingStore(source, 'test-project');

    await store.listEntries({ filter: 'severity>=ERROR', pageSize: 25 });

    expect(getEntries).toHaveBeenCalledWith({
      filter: 'severity>=ERROR',
      orderBy: 'timestamp desc',
      pageSize: 25,
      maxResults: 25,
      autoPaginate: false,
      resourceNames: ['projects/test-project'],
    });
  });

  it('never returns more than the page size', async () => {
    const entries = ['a', 'b', 'c'].map((text) => new Entry({}, text));
    const { source } = createSource(entries);
    const store = new CloudLoggingStore(source, 'test-project');

    const result = await store.listEntries({ filter: '', pageSize: 2 });

    expect(result).toEqual(entries.slice(0, 2));
  });

  it('propagates client failures to the caller', async () => {
    const source: EntriesSource = {
      getEntries: vi.fn(async () => {
        throw Object.assign(new Error('7 PERMISSION_DENIED'), { code: 7 });
      }),
    };
    const store = new CloudLoggingStore(source, 'test-project');

    await expect(store.listEntries({ filter: '', pageSize: 1 })).rejects.toThrow('7 PERMISSION_DENIED');
  });
});
