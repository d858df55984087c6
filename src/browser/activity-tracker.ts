/**
 * Activity Tracker
 *
 * Keeps the set of in-flight document and XHR requests for one page. The set
 * is the quiescence signal for mutation settling: a page is idle when no
 * request started after an action is still outstanding.
 *
 * Request bookkeeping is scoped to frames. When a frame starts loading, every
 * activity it owns is dropped, since responses for the previous document may
 * never arrive.
 */

import { z } from 'zod';
import type { CdpClient, CdpEventParams, Subscription } from '../cdp/cdp-client.interface.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

export type ActivityKind = 'document' | 'xhr' | 'other';

/**
 * One outstanding request.
 */
export interface Activity {
  requestId: string;
  kind: ActivityKind;
  url: string;
  method: string;
  frameId: string | undefined;
}

export interface ActivityTrackerOptions {
  /** Kinds inserted on request start (default: document, xhr) */
  trackedKinds?: readonly ActivityKind[];
  logger?: Logger;
}

export const DEFAULT_TRACKED_KINDS: readonly ActivityKind[] = ['document', 'xhr'];

const REQUEST_STARTED = 'Network.requestWillBeSent';
const RESPONSE_FINISHED = 'Network.responseReceived';
const LOADING_FAILED = 'Network.loadingFailed';
const FRAME_STARTED_LOADING = 'Page.frameStartedLoading';

const RequestWillBeSentSchema = z.object({
  requestId: z.string(),
  type: z.string().optional(),
  frameId: z.string().optional(),
  request: z.object({
    url: z.string(),
    method: z.string(),
  }),
});

const RequestIdSchema = z.object({ requestId: z.string() });

const FrameIdSchema = z.object({ frameId: z.string() });

/**
 * Map a CDP resource type to an activity kind.
 * `Fetch` requests count as XHR: both are script-initiated data loads.
 */
export function toActivityKind(resourceType: string | undefined): ActivityKind {
  switch (resourceType) {
    case 'Document':
      return 'document';
    case 'XHR':
    case 'Fetch':
      return 'xhr';
    default:
      return 'other';
  }
}

export class ActivityTracker {
  private readonly outstanding = new Map<string, Activity>();
  private readonly trackedKinds: ReadonlySet<ActivityKind>;
  private subscription: Subscription | null = null;

  private constructor(
    private readonly logger: Logger,
    trackedKinds: readonly ActivityKind[],
  ) {
    this.trackedKinds = new Set(trackedKinds);
  }

  /**
   * Subscribe to request and frame events, then enable the Page and Network
   * domains. Subscribing first means no event emitted by enabling is missed.
   *
   * @throws the enable failure, after the subscription has been closed
   */
  static async init(cdp: CdpClient, options: ActivityTrackerOptions = {}): Promise<ActivityTracker> {
    const tracker = new ActivityTracker(
      options.logger ?? getLogger().child('activity'),
      options.trackedKinds ?? DEFAULT_TRACKED_KINDS,
    );

    tracker.subscription = cdp.subscribe(
      [REQUEST_STARTED, RESPONSE_FINISHED, LOADING_FAILED, FRAME_STARTED_LOADING],
      (method, params) => tracker.handleEvent(method, params),
    );

    try {
      await cdp.send('Page.enable', undefined);
      await cdp.send('Network.enable', {});
    } catch (error) {
      tracker.dispose();
      throw error;
    }

    return tracker;
  }

  /**
   * Snapshot of the outstanding activities, in start order.
   */
  activities(): Activity[] {
    return [...this.outstanding.values()];
  }

  /**
   * Whether event delivery is still active.
   */
  isTracking(): boolean {
    return this.subscription?.isActive() ?? false;
  }

  /**
   * Stop tracking. The last snapshot stays readable. Never throws.
   */
  dispose(): void {
    this.subscription?.close();
    this.subscription = null;
  }

  private handleEvent(method: string, params: CdpEventParams): void {
    switch (method) {
      case REQUEST_STARTED:
        this.onRequestStarted(params);
        break;
      case RESPONSE_FINISHED:
      case LOADING_FAILED:
        this.onRequestFinished(method, params);
        break;
      case FRAME_STARTED_LOADING:
        this.onFrameStartedLoading(params);
        break;
    }
  }

  private onRequestStarted(params: CdpEventParams): void {
    const parsed = RequestWillBeSentSchema.safeParse(params);
    if (!parsed.success) {
      this.logger.debug('Ignoring malformed request event', { method: REQUEST_STARTED });
      return;
    }

    const { requestId, type, frameId, request } = parsed.data;
    const kind = toActivityKind(type);
    if (!this.trackedKinds.has(kind)) return;

    // Redirects reuse the request id; the latest request wins
    this.outstanding.set(requestId, {
      requestId,
      kind,
      url: request.url,
      method: request.method,
      frameId,
    });
  }

  private onRequestFinished(method: string, params: CdpEventParams): void {
    const parsed = RequestIdSchema.safeParse(params);
    if (!parsed.success) {
      this.logger.debug('Ignoring malformed request event', { method });
      return;
    }
    this.outstanding.delete(parsed.data.requestId);
  }

  private onFrameStartedLoading(params: CdpEventParams): void {
    const parsed = FrameIdSchema.safeParse(params);
    if (!parsed.success) {
      this.logger.debug('Ignoring malformed frame event', { method: FRAME_STARTED_LOADING });
      return;
    }

    const { frameId } = parsed.data;
    for (const [requestId, activity] of this.outstanding) {
      if (activity.frameId === frameId) {
        this.outstanding.delete(requestId);
      }
    }
  }
}
