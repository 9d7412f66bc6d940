export * from './types.js';
export { ProviderError, InvariantViolation } from './errors.js';
export { ActivityLog, type ActivityEvent, type ActivityListener, type ActivityType } from './activity.js';
export { generateId, now, trackKey } from './utils.js';
export * from './blackboard/index.js';
export * from './provider/index.js';
export * from './sources/index.js';
export * from './orchestration/index.js';
