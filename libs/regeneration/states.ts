/**
 * Regeneration Controller States
 *
 * Explicit transition table for the generate -> validate -> repair loop.
 * A transition missing from the table is a programming error and throws.
 */

import type { OutcomeStatus } from '../sandbox/types.js';

export type ControllerState =
    | 'START'
    | 'PROPOSE'
    | 'VALIDATE'
    | 'ANALYZE'
    | 'REPAIR_PROPOSE'
    | 'SUCCEEDED'
    | 'EXHAUSTED'
    | 'CANCELLED'
    | 'INFRASTRUCTURE_ERROR';

export type TerminalState = 'SUCCEEDED' | 'EXHAUSTED' | 'CANCELLED' | 'INFRASTRUCTURE_ERROR';

export const ALLOWED_TRANSITIONS: Readonly<Record<ControllerState, readonly ControllerState[]>> = {
    START: ['PROPOSE', 'CANCELLED'],
    PROPOSE: ['VALIDATE', 'CANCELLED', 'INFRASTRUCTURE_ERROR'],
    VALIDATE: ['SUCCEEDED', 'ANALYZE', 'EXHAUSTED', 'CANCELLED', 'INFRASTRUCTURE_ERROR'],
    ANALYZE: ['REPAIR_PROPOSE', 'CANCELLED'],
    REPAIR_PROPOSE: ['VALIDATE', 'CANCELLED', 'INFRASTRUCTURE_ERROR'],
    SUCCEEDED: [],
    EXHAUSTED: [],
    CANCELLED: [],
    INFRASTRUCTURE_ERROR: []
};

export class IllegalTransitionError extends Error {
    constructor(
        public readonly from: ControllerState,
        public readonly to: ControllerState
    ) {
        super(`Illegal controller transition ${from} -> ${to}`);
        this.name = 'IllegalTransitionError';
        Object.setPrototypeOf(this, IllegalTransitionError.prototype);
    }
}

export function assertTransition(from: ControllerState, to: ControllerState): void {
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
        throw new IllegalTransitionError(from, to);
    }
}

export function isTerminal(state: ControllerState): state is TerminalState {
    return ALLOWED_TRANSITIONS[state].length === 0;
}

/**
 * Successor of VALIDATE once the attempt has been recorded.
 */
export function nextStateAfterValidation(
    status: OutcomeStatus,
    attemptsRecorded: number,
    retryBudget: number
): 'SUCCEEDED' | 'ANALYZE' | 'EXHAUSTED' {
    if (status === 'SUCCESS') return 'SUCCEEDED';
    return attemptsRecorded < retryBudget ? 'ANALYZE' : 'EXHAUSTED';
}
