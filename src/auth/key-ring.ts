/**
 * Service token signing keys.
 *
 * One key signs; keys it replaced keep verifying until their grace window
 * closes, so tokens minted just before a rotation stay usable for their
 * remaining lifetime.
 */

import { createSecretKey, KeyObject } from 'crypto';
import { logger } from '../logger';

export const MIN_SECRET_LENGTH = 32;

export interface SigningKeyConfig {
  id: string;
  secret: string;
}

export interface ResolvedKey {
  id: string;
  key: KeyObject;
}

interface RetiredKey extends ResolvedKey {
  /** Epoch ms after which the key no longer verifies. */
  expiresAt: number;
}

export interface KeyRingOptions {
  graceSeconds: number;
  /** Keys retired before this process started; they get a full grace window from now. */
  previous?: SigningKeyConfig[];
  now?: () => number;
}

function toKey(config: SigningKeyConfig): ResolvedKey {
  if (!config.id) throw new Error('Signing key id must not be empty');
  if (config.secret.length < MIN_SECRET_LENGTH) {
    throw new Error(`Signing key "${config.id}" must be at least ${MIN_SECRET_LENGTH} characters`);
  }
  return { id: config.id, key: createSecretKey(Buffer.from(config.secret, 'utf8')) };
}

export class KeyRing {
  private active: ResolvedKey;
  private retired: RetiredKey[] = [];
  private graceMs: number;
  private now: () => number;
  private log = logger.child({ component: 'key-ring' });

  constructor(current: SigningKeyConfig, options: KeyRingOptions) {
    this.graceMs = options.graceSeconds * 1000;
    this.now = options.now ?? Date.now;
    this.active = toKey(current);
    for (const previous of options.previous ?? []) {
      if (previous.id === current.id) continue;
      this.retired.push({ ...toKey(previous), expiresAt: this.now() + this.graceMs });
    }
  }

  get current(): ResolvedKey {
    return this.active;
  }

  /** Make `next` the signing key; the old key verifies for the grace window. */
  rotate(next: SigningKeyConfig): void {
    const incoming = toKey(next);
    if (incoming.id === this.active.id) {
      throw new Error(`Signing key "${incoming.id}" is already active`);
    }
    this.retired = this.retired.filter((key) => key.id !== incoming.id);
    this.retired.push({ ...this.active, expiresAt: this.now() + this.graceMs });
    this.log.info('Signing key rotated', { previousKeyId: this.active.id, keyId: incoming.id, graceSeconds: this.graceMs / 1000 });
    this.active = incoming;
  }

  /** Key that may verify tokens carrying `kid`, or null. */
  resolve(kid: string): KeyObject | null {
    if (kid === this.active.id) return this.active.key;
    const now = this.now();
    this.retired = this.retired.filter((key) => key.expiresAt > now);
    return this.retired.find((key) => key.id === kid)?.key ?? null;
  }

  verifyingKeyIds(): string[] {
    const now = this.now();
    return [this.active.id, ...this.retired.filter((key) => key.expiresAt > now).map((key) => key.id)];
  }
}
