import type { Candidate, Notifiable } from '../blackboard/candidate.js';
import { createProposal, type Hypothesis } from '../blackboard/hypothesis.js';
import type { Workspace } from '../blackboard/workspace.js';

/**
 * Replace a source's retractable hypothesis with one for `candidate`.
 * If the held one already points at the same track it is kept as is.
 * The old claim is retracted before the new one is recorded.
 */
export function proposeOnce(
  board: Workspace,
  source: Notifiable,
  candidate: Candidate,
  reason: string,
  score: number,
): Hypothesis {
  const held = board.retractableBy(source);
  if (held) {
    if (held.candidate.id === candidate.id) return held;
    board.retract(held);
  }

  const proposal = createProposal(candidate, source, reason, score);
  board.record(proposal);
  candidate.subscribe(source);
  return proposal;
}

export function resignCurrent(board: Workspace, source: Notifiable): Hypothesis | undefined {
  const held = board.retractableBy(source);
  if (held) board.retract(held);
  return held;
}
