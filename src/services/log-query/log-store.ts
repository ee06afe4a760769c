/**
 * Log store collaborator
 *
 * `LogStore` is the only seam the fetcher talks to. The Cloud Logging
 * implementation asks for a single page in reverse-chronological order.
 */

import type { Entry } from '@google-cloud/logging';
import type { GetEntriesRequest } from '@google-cloud/logging/build/src/log';

export interface LogQuery {
  /** Complete filter text, time range included */
  filter: string;
  pageSize: number;
}

export interface LogStore {
  /** Newest first, at most `pageSize` raw entries */
  listEntries(query: LogQuery): Promise<unknown[]>;
}

/** The part of `Logging` the store needs */
export interface EntriesSource {
  getEntries(request: GetEntriesRequest): Promise<[Entry[], ...unknown[]]>;
}

export class CloudLoggingStore implements LogStore {
  constructor(
    private readonly source: EntriesSource,
    private readonly projectId: string
  ) {}

  async listEntries(query: LogQuery): Promise<unknown[]> {
    const [entries] = await this.source.getEntries({
      filter: query.filter,
      orderBy: 'timestamp desc',
      pageSize: query.pageSize,
      maxResults: query.pageSize,
      autoPaginate: false,
      resourceNames: [`projects/${this.projectId}`],
    });
    return entries.slice(0, query.pageSize);
  }
}
