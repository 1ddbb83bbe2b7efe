/**
 * Regeneration Library
 *
 * Exports for the generate -> validate -> repair loop.
 */

export type {
    Attempt,
    Candidate,
    CandidateProvenance,
    InfrastructureFault,
    SessionResult,
    SessionStatus
} from './attempt.js';
export { createCandidate } from './attempt.js';
export { SessionLog, AttemptLogViolation } from './sessionLog.js';
export type { ControllerState, TerminalState } from './states.js';
export {
    ALLOWED_TRANSITIONS,
    IllegalTransitionError,
    assertTransition,
    isTerminal,
    nextStateAfterValidation
} from './states.js';
export type { ProposalOptions, ProposalRequest, ScriptProposer } from './proposer.js';
export { requestCandidateScript } from './proposer.js';
export type { RepairContext } from './repairContext.js';
export { buildRepairContext } from './repairContext.js';
export type { RegenerationControllerDeps, RegenerationRequest } from './regenerationController.js';
export { RegenerationController } from './regenerationController.js';
export type { ErrorKindCount, StatsSnapshot } from './regenerationStats.js';
export { RegenerationStats } from './regenerationStats.js';
export { formatSessionReport } from './sessionReport.js';
