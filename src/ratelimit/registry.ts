/**
 * Shared rate limit handlers, one per group and scope.
 *
 * A handler stays registered while it has work (in-flight requests,
 * cooldowns or queued requests) or while a proxy pins it. Once it goes idle
 * and nobody pins it, it is dropped and whoever waits on its release wakes up.
 */

import { RateLimitHandler } from './handler.js';

interface RegistryEntry {
  handler: RateLimitHandler;
  pins: number;
  released: Promise<void>;
  resolveReleased: () => void;
}

export class HandlerRegistry {
  private readonly entries: Map<string, RegistryEntry> = new Map();

  get size(): number {
    return this.entries.size;
  }

  get(key: string): RateLimitHandler | undefined {
    return this.entries.get(key)?.handler;
  }

  /**
   * Whether this exact handler instance is the registered one.
   */
  has(handler: RateLimitHandler): boolean {
    return this.entries.get(handler.key)?.handler === handler;
  }

  /**
   * The registered handler equal to `template`, registering `template`
   * itself when there is none.
   */
  obtain(template: RateLimitHandler): RateLimitHandler {
    return this.entryFor(template).handler;
  }

  /**
   * Keeps the handler equal to `template` registered until `unpin`.
   */
  pin(template: RateLimitHandler): RateLimitHandler {
    const entry = this.entryFor(template);
    entry.pins += 1;
    return entry.handler;
  }

  unpin(handler: RateLimitHandler): void {
    const entry = this.entries.get(handler.key);
    if (entry === undefined || entry.handler !== handler || entry.pins === 0) {
      return;
    }
    entry.pins -= 1;
    this.releaseIfIdle(handler);
  }

  isPinned(handler: RateLimitHandler): boolean {
    const entry = this.entries.get(handler.key);
    return entry !== undefined && entry.handler === handler && entry.pins > 0;
  }

  /**
   * Resolves once `handler` is no longer registered.
   */
  whenReleased(handler: RateLimitHandler): Promise<void> {
    const entry = this.entries.get(handler.key);
    if (entry === undefined || entry.handler !== handler) {
      return Promise.resolve();
    }
    return entry.released;
  }

  values(): RateLimitHandler[] {
    return [...this.entries.values()].map((entry) => entry.handler);
  }

  /**
   * Drops every handler, rejecting whatever is still queued on them.
   */
  clear(): void {
    for (const entry of this.entries.values()) {
      entry.handler.setIdleListener(undefined);
      entry.handler.dispose();
      entry.resolveReleased();
    }
    this.entries.clear();
  }

  private entryFor(template: RateLimitHandler): RegistryEntry {
    const existing = this.entries.get(template.key);
    if (existing !== undefined) {
      return existing;
    }

    let resolveReleased: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      resolveReleased = resolve;
    });

    const entry: RegistryEntry = { handler: template, pins: 0, released, resolveReleased };
    this.entries.set(template.key, entry);
    template.setIdleListener((handler) => this.releaseIfIdle(handler));
    return entry;
  }

  private releaseIfIdle(handler: RateLimitHandler): void {
    const entry = this.entries.get(handler.key);
    if (entry === undefined || entry.handler !== handler) {
      return;
    }
    if (entry.pins > 0 || !handler.isIdle()) {
      return;
    }

    this.entries.delete(handler.key);
    handler.setIdleListener(undefined);
    entry.resolveReleased();
  }
}
