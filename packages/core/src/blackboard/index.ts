export { Candidate, type CandidateFields, type Notifiable } from './candidate.js';
export {
  createAssertion,
  createProposal,
  describeHypothesis,
  type Hypothesis,
  type PermanentKind,
} from './hypothesis.js';
export { Workspace, type BoardSnapshot } from './workspace.js';
