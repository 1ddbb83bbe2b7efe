/**
 * Attempt Model
 *
 * Candidates and attempts are frozen when created. A session's attempts
 * form an append-only log; nothing recorded is ever rewritten.
 */

import type { ErrorRecord } from '../classification/errorTypes.js';
import type { InfrastructureCode, InfrastructureSource } from '../errors/InfrastructureError.js';
import type { ExecutionOutcome } from '../sandbox/types.js';
import type { ControllerState, TerminalState } from './states.js';

/**
 * Where a candidate came from.
 */
export type CandidateProvenance =
    | { readonly kind: 'initial'; readonly source: 'caller' | 'proposer' }
    | { readonly kind: 'repair'; readonly repairOf: number };

export interface Candidate {
    readonly script: string;
    /** 0 for the first attempt, +1 per attempt */
    readonly attemptIndex: number;
    readonly provenance: CandidateProvenance;
}

export interface Attempt {
    readonly candidate: Candidate;
    readonly outcome: ExecutionOutcome;
    /** Present exactly when the outcome is not SUCCESS */
    readonly errorRecord?: ErrorRecord;
    /** ISO-8601 */
    readonly recordedAt: string;
}

export type SessionStatus = TerminalState;

export interface InfrastructureFault {
    readonly source: InfrastructureSource;
    readonly code: InfrastructureCode;
    readonly message: string;
}

export interface SessionResult {
    readonly sessionId: string;
    readonly status: SessionStatus;
    /** Set only when status is SUCCEEDED */
    readonly finalScript?: string;
    readonly extractedFieldCount?: number;
    readonly attempts: readonly Attempt[];
    /** Most recent classified failure; the primary diagnostic when EXHAUSTED */
    readonly lastError?: ErrorRecord;
    readonly infrastructureError?: InfrastructureFault;
    /** States visited, START first */
    readonly stateTrail: readonly ControllerState[];
}

export function createCandidate(script: string, attemptIndex: number, provenance: CandidateProvenance): Candidate {
    if (!Number.isInteger(attemptIndex) || attemptIndex < 0) {
        throw new RangeError(`attemptIndex must be a non-negative integer, got ${attemptIndex}`);
    }
    if (provenance.kind === 'repair' && provenance.repairOf >= attemptIndex) {
        throw new RangeError(`Repair candidate ${attemptIndex} cannot repair attempt ${provenance.repairOf}`);
    }
    return Object.freeze<Candidate>({
        script,
        attemptIndex,
        provenance: Object.freeze(provenance)
    });
}
