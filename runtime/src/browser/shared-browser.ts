/**
 * One lazily launched browser shared by every audit in the process.
 *
 * @module
 */

import { toErrorMessage } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { BrowserUnavailableError } from './errors.js';

/** What the shared browser needs from a launched engine. */
export interface BrowserHandle {
  isConnected(): boolean;
  close(): Promise<void>;
}

export type BrowserLauncher<B extends BrowserHandle> = () => Promise<B>;

export interface SharedBrowserConfig<B extends BrowserHandle> {
  launch: BrowserLauncher<B>;
  logger?: Logger;
}

/**
 * Owns a single browser handle.
 *
 * Concurrent first users share one launch. Access goes through {@link use},
 * which holds a lease for the duration of the callback. A handle that
 * reports itself disconnected is closed and replaced on the next lease.
 * {@link close} refuses new leases, waits for active ones and closes the
 * handle.
 */
export class SharedBrowser<B extends BrowserHandle> {
  private readonly launcher: BrowserLauncher<B>;
  private readonly logger: Logger;
  private instance: B | null = null;
  /** In-flight launch, shared by concurrent callers */
  private launching: Promise<B> | null = null;
  private leases = 0;
  private launches = 0;
  private closing: Promise<void> | null = null;
  private drainWaiters: Array<() => void> = [];
  /** Closes of disconnected handles still in flight */
  private readonly discarding = new Set<Promise<void>>();

  constructor(config: SharedBrowserConfig<B>) {
    this.launcher = config.launch;
    this.logger = config.logger ?? silentLogger;
  }

  get activeLeases(): number {
    return this.leases;
  }

  get launchCount(): number {
    return this.launches;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  /**
   * Run `fn` with the shared browser. The lease is released when `fn`
   * settles.
   *
   * @throws BrowserUnavailableError when closing or when the launch fails
   */
  async use<T>(fn: (browser: B) => Promise<T>): Promise<T> {
    if (this.closing) {
      throw new BrowserUnavailableError('Shared browser is closed');
    }
    this.leases += 1;
    try {
      const browser = await this.acquire();
      return await fn(browser);
    } finally {
      this.leases -= 1;
      if (this.leases === 0) this.notifyDrained();
    }
  }

  /** Close the browser once active leases are released. Idempotent. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async acquire(): Promise<B> {
    if (this.instance?.isConnected()) return this.instance;
    if (this.instance) {
      this.logger.warn('Shared browser disconnected; relaunching');
      const stale = this.instance;
      this.instance = null;
      const closing = this.discard(stale).finally(() => this.discarding.delete(closing));
      this.discarding.add(closing);
    }
    if (!this.launching) {
      this.launching = this.launch();
    }
    return this.launching;
  }

  private async launch(): Promise<B> {
    this.launches += 1;
    this.logger.debug('Launching shared browser');
    try {
      const browser = await this.launcher();
      this.instance = browser;
      return browser;
    } catch (error) {
      throw new BrowserUnavailableError(`Shared browser failed to launch: ${toErrorMessage(error)}`, error);
    } finally {
      this.launching = null;
    }
  }

  /** Close a handle that is no longer used. Never rejects. */
  private async discard(browser: B): Promise<void> {
    try {
      await browser.close();
    } catch (error) {
      this.logger.warn(`Closing disconnected browser failed: ${toErrorMessage(error)}`);
    }
  }

  private async shutdown(): Promise<void> {
    if (this.leases > 0) {
      await new Promise<void>((resolve) => {
        this.drainWaiters.push(resolve);
      });
    }
    await Promise.all([...this.discarding]);
    // Null the reference first so a failing close leaves no stale handle.
    const browser = this.instance;
    this.instance = null;
    if (browser) {
      this.logger.debug('Closing shared browser');
      await browser.close();
    }
  }

  private notifyDrained(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
