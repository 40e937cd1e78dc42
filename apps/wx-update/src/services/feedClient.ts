/**
 * Conditional download of published feed files.
 *
 * A HEAD request reads Last-Modified first; the body is only requested when
 * the file changed since the caller's marker. The body is handed back as a
 * stream so rows can be consumed as they arrive.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import type { Readable } from 'stream';
import { FeedTransportError, errorMessage } from '@wx/shared';

export type FeedFetchResult =
  | { status: 'not-modified'; lastModified: Date }
  | { status: 'fetched'; body: Readable; fetchedAt: Date };

export interface FeedClient {
  fetchIfModified(url: string, since: Date): Promise<FeedFetchResult>;
}

export class HttpFeedClient implements FeedClient {
  private http: AxiosInstance;

  constructor(private timeoutMs: number = 60 * 1000) {
    this.http = axios.create({
      timeout: timeoutMs,
      // Status codes are checked here so the message can name the request
      validateStatus: () => true,
      headers: { 'User-Agent': 'wx-update/1.0' }
    });
  }

  async fetchIfModified(url: string, since: Date): Promise<FeedFetchResult> {
    const head = await this.request('HEAD', url, () => this.http.head(url));
    if (head.status !== 200) {
      throw new FeedTransportError(`HEAD ${url} resulted in code ${head.status}`, url);
    }

    const header = head.headers['last-modified'];
    if (typeof header === 'string') {
      const lastModified = Date.parse(header);
      if (Number.isNaN(lastModified)) {
        throw new FeedTransportError(`Cannot parse Last-Modified "${header}" from ${url}`, url);
      }
      if (lastModified <= since.getTime()) {
        return { status: 'not-modified', lastModified: new Date(lastModified) };
      }
    }

    const fetchedAt = new Date();
    const response = await this.request('GET', url, () =>
      this.http.get<Readable>(url, {
        responseType: 'stream',
        // axios' timeout stops at the response headers; this also bounds the body
        signal: AbortSignal.timeout(this.timeoutMs)
      })
    );
    if (response.status !== 200) {
      response.data.destroy();
      throw new FeedTransportError(`GET ${url} resulted in code ${response.status}`, url);
    }
    return { status: 'fetched', body: response.data, fetchedAt };
  }

  private async request<T>(method: string, url: string, send: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await send();
    } catch (error) {
      throw new FeedTransportError(`${method} ${url} failed: ${errorMessage(error)}`, url);
    }
  }
}
