/**
 * Error taxonomy for the recommender core.
 *
 * Nothing in core catches these. A ProviderError ends the current cycle;
 * an InvariantViolation means the blackboard was driven into a state it
 * must never reach.
 */

export class ProviderError extends Error {
  override readonly name = 'ProviderError';

  constructor(
    message: string,
    readonly method?: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class InvariantViolation extends Error {
  override readonly name = 'InvariantViolation';
}
