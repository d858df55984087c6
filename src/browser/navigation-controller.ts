/**
 * Navigation Controller
 *
 * Blocking page navigation: each operation resolves once the main frame has
 * fired its `load` lifecycle event (or navigated within the same document).
 * Sub-frame events are told apart by the tracked main frame id.
 */

import { z } from 'zod';
import type { CdpClient, Subscription } from '../cdp/cdp-client.interface.js';
import { TimeoutError } from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

const LifecycleEventSchema = z.object({
  frameId: z.string(),
  name: z.string(),
});

const SameDocumentNavigationSchema = z.object({
  frameId: z.string(),
});

const FrameNavigatedSchema = z.object({
  frame: z.object({
    id: z.string(),
    parentId: z.string().optional(),
  }),
});

export interface NavigationControllerOptions {
  logger?: Logger;
}

export class NavigationController {
  private mainFrameId: string;
  private subscription: Subscription | null = null;

  private constructor(
    private readonly cdp: CdpClient,
    mainFrameId: string,
    private readonly logger: Logger,
  ) {
    this.mainFrameId = mainFrameId;
  }

  /**
   * Enable Page lifecycle events and read the main frame id.
   */
  static async attach(cdp: CdpClient, options: NavigationControllerOptions = {}): Promise<NavigationController> {
    await cdp.send('Page.enable', undefined);
    await cdp.send('Page.setLifecycleEventsEnabled', { enabled: true });
    const { frameTree } = await cdp.send('Page.getFrameTree', undefined);

    const controller = new NavigationController(
      cdp,
      frameTree.frame.id,
      options.logger ?? getLogger().child('navigation'),
    );
    controller.subscription = cdp.subscribe(['Page.frameNavigated'], (_method, params) => {
      const parsed = FrameNavigatedSchema.safeParse(params);
      if (parsed.success && parsed.data.frame.parentId === undefined) {
        controller.mainFrameId = parsed.data.frame.id;
      }
    });
    return controller;
  }

  getMainFrameId(): string {
    return this.mainFrameId;
  }

  /**
   * Run `operation` and wait for the main frame to finish loading.
   *
   * The load listener is registered before `operation` runs, so a load that
   * completes before `operation` resolves is not missed. A `timeoutMs` of 0
   * returns right after `operation`.
   *
   * @throws TimeoutError if the main frame does not load in time
   */
  async navigate<T>(operation: () => Promise<T>, timeoutMs: number, description = 'main frame load'): Promise<T> {
    let markLoaded: () => void = () => undefined;
    const loaded = new Promise<void>((resolve) => {
      markLoaded = resolve;
    });

    const subscription = this.cdp.subscribe(
      ['Page.lifecycleEvent', 'Page.navigatedWithinDocument'],
      (method, params) => {
        if (method === 'Page.lifecycleEvent') {
          const parsed = LifecycleEventSchema.safeParse(params);
          if (parsed.success && parsed.data.name === 'load' && parsed.data.frameId === this.mainFrameId) {
            markLoaded();
          }
        } else {
          const parsed = SameDocumentNavigationSchema.safeParse(params);
          if (parsed.success && parsed.data.frameId === this.mainFrameId) {
            markLoaded();
          }
        }
      },
    );

    try {
      const result = await operation();
      if (timeoutMs > 0) {
        await this.waitForSignal(loaded, timeoutMs, description);
      }
      return result;
    } finally {
      subscription.close();
    }
  }

  /**
   * Navigate the page to `url` and wait for it to load.
   */
  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.navigate(
      async () => {
        const { errorText } = await this.cdp.send('Page.navigate', { url });
        if (errorText) {
          // Chrome still commits an error page and fires load for it
          this.logger.warning('Navigation reported an error', { url, errorText });
        }
      },
      timeoutMs,
      `load of ${url}`,
    );
  }

  /**
   * Go one entry back in history.
   *
   * @returns false, without waiting, when there is no previous entry
   */
  back(timeoutMs: number): Promise<boolean> {
    return this.traverseHistory(-1, timeoutMs);
  }

  /**
   * Go one entry forward in history.
   *
   * @returns false, without waiting, when there is no next entry
   */
  forward(timeoutMs: number): Promise<boolean> {
    return this.traverseHistory(1, timeoutMs);
  }

  async reload(timeoutMs: number): Promise<void> {
    await this.navigate(() => this.cdp.send('Page.reload', {}), timeoutMs, 'reload of the page');
  }

  /**
   * Stop following main frame changes.
   */
  detach(): void {
    this.subscription?.close();
    this.subscription = null;
  }

  private async traverseHistory(offset: -1 | 1, timeoutMs: number): Promise<boolean> {
    const { currentIndex, entries } = await this.cdp.send('Page.getNavigationHistory', undefined);
    const entry = entries.at(currentIndex + offset);
    if (currentIndex + offset < 0 || entry === undefined) {
      return false;
    }

    await this.navigate(
      () => this.cdp.send('Page.navigateToHistoryEntry', { entryId: entry.id }),
      timeoutMs,
      `history navigation to ${entry.url}`,
    );
    return true;
  }

  private async waitForSignal(signal: Promise<void>, timeoutMs: number, description: string): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(description, timeoutMs, { mainFrameId: this.mainFrameId }));
      }, timeoutMs);
    });

    try {
      await Promise.race([signal, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
