/**
 * In-process storage backend.
 *
 * Used for development and tests. Faults can be queued per operation to
 * exercise retry and quarantine paths, and stored bytes can be tampered with
 * to simulate silent corruption.
 */

import { BackendError, BackendErrorKind, StorageBackend } from './backend';

export type BackendOperation = 'write' | 'read' | 'exists' | 'delete';

interface QueuedFault {
  operation: BackendOperation;
  kind: BackendErrorKind;
  remaining: number;
}

export interface MemoryBackendOptions {
  /** Artificial delay applied to every operation. */
  latencyMs?: number;
}

export class MemoryBackend implements StorageBackend {
  readonly name: string;
  private objects = new Map<string, Buffer>();
  private faults: QueuedFault[] = [];
  private latencyMs: number;
  readonly calls: Record<BackendOperation, number> = { write: 0, read: 0, exists: 0, delete: 0 };

  constructor(name = 'memory', options: MemoryBackendOptions = {}) {
    this.name = name;
    this.latencyMs = options.latencyMs ?? 0;
  }

  /** Fail the next `times` calls of `operation` with a BackendError of `kind`. */
  injectFault(operation: BackendOperation, kind: BackendErrorKind, times = 1): void {
    this.faults.push({ operation, kind, remaining: times });
  }

  /** Replace stored bytes without going through write(). */
  tamper(hash: string, bytes: Buffer): void {
    this.objects.set(hash, Buffer.from(bytes));
  }

  has(hash: string): boolean {
    return this.objects.has(hash);
  }

  get size(): number {
    return this.objects.size;
  }

  async write(hash: string, bytes: Buffer): Promise<void> {
    await this.enter('write');
    this.objects.set(hash, Buffer.from(bytes));
  }

  async read(hash: string): Promise<Buffer> {
    await this.enter('read');
    const bytes = this.objects.get(hash);
    if (!bytes) throw new BackendError(this.name, 'not-found', `No object ${hash}`);
    return Buffer.from(bytes);
  }

  async exists(hash: string): Promise<boolean> {
    await this.enter('exists');
    return this.objects.has(hash);
  }

  async delete(hash: string): Promise<void> {
    await this.enter('delete');
    this.objects.delete(hash);
  }

  private async enter(operation: BackendOperation): Promise<void> {
    this.calls[operation] += 1;
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }
    const fault = this.faults.find((f) => f.operation === operation && f.remaining > 0);
    if (fault) {
      fault.remaining -= 1;
      this.faults = this.faults.filter((f) => f.remaining > 0);
      throw new BackendError(this.name, fault.kind, `Injected ${fault.kind} fault on ${operation}`);
    }
  }
}
