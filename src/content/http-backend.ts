/**
 * HTTP object-store backend.
 *
 * Talks to any store exposing objects at `<endpoint>/<hash>` through PUT,
 * GET, HEAD and DELETE (an S3/Swift-style gateway or an archival mirror's
 * upload API). Each request is bounded by `timeoutMs`; timeouts and network
 * failures surface as transient BackendErrors.
 */

import { BackendError, classifyHttpStatus, StorageBackend } from './backend';

/** Fetch signature (injectable for testing). */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpObjectBackendOptions {
  name: string;
  endpoint: string;
  token?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

export class HttpObjectBackend implements StorageBackend {
  readonly name: string;
  private endpoint: string;
  private token?: string;
  private timeoutMs: number;
  private fetchFn: FetchFn;

  constructor(options: HttpObjectBackendOptions) {
    this.name = options.name;
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  async write(hash: string, bytes: Buffer): Promise<void> {
    const res = await this.request('PUT', hash, {
      body: new Uint8Array(bytes),
      headers: {
        'Content-Type': 'application/octet-stream',
        'X-Content-SHA256': hash,
      },
    });
    if (!res.ok) throw this.failure('write', hash, res.status);
  }

  async read(hash: string): Promise<Buffer> {
    const res = await this.request('GET', hash);
    if (!res.ok) throw this.failure('read', hash, res.status);
    return Buffer.from(await res.arrayBuffer());
  }

  async exists(hash: string): Promise<boolean> {
    const res = await this.request('HEAD', hash);
    if (res.ok) return true;
    if (res.status === 404) return false;
    throw this.failure('exists', hash, res.status);
  }

  async delete(hash: string): Promise<void> {
    const res = await this.request('DELETE', hash);
    if (res.ok || res.status === 404) return;
    throw this.failure('delete', hash, res.status);
  }

  objectUrl(hash: string): string {
    return `${this.endpoint}/${hash}`;
  }

  private async request(
    method: string,
    hash: string,
    init: { body?: Uint8Array; headers?: Record<string, string> } = {},
  ): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const headers: Record<string, string> = { ...init.headers };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    try {
      return await this.fetchFn(this.objectUrl(hash), {
        method,
        headers,
        body: init.body,
        signal: controller.signal,
      });
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : 'network error';
      throw new BackendError(this.name, 'transient', `${method} ${hash} failed: ${reason}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private failure(operation: string, hash: string, statusCode: number): BackendError {
    return new BackendError(
      this.name,
      classifyHttpStatus(statusCode),
      `${operation} ${hash} returned HTTP ${statusCode}`,
      statusCode,
    );
  }
}
