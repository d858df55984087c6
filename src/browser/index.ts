/**
 * Browser Module
 *
 * Exports for page sessions, navigation and activity tracking.
 */

export {
  ActivityTracker,
  toActivityKind,
  DEFAULT_TRACKED_KINDS,
  type Activity,
  type ActivityKind,
  type ActivityTrackerOptions,
} from './activity-tracker.js';
export {
  runMutation,
  newActivities,
  DEFAULT_MUTATION_GRACE_MS,
  type MutationOptions,
} from './page-stabilization.js';
export { NavigationController, type NavigationControllerOptions } from './navigation-controller.js';
export {
  BrowserSession,
  type BrowserSessionOptions,
  type FindOptions,
  type TimeoutOption,
} from './browser-session.js';
