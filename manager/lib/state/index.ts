/**
 * Session state module
 *
 * Re-exports SessionRegistry and all related types/utilities from a single entry point.
 */

export { SessionRegistry } from './sessions';
export type { SessionRegistryOptions, CloseAllResult } from './sessions';

export {
  // Utility functions
  buildRuleGroupId,
  canTransition,
  toSummary,
} from './types';

export type {
  Protocol,
  SessionState,
  TargetEndpoint,
  Session,
  SessionSummary,
  HealthReport,
} from './types';
