export { Arbiter, type ArbiterSources } from './arbiter.js';
export {
  RecommendationSession,
  type Presenter,
  type SeedRequest,
  type SessionOptions,
  type SessionOutcome,
} from './session.js';
