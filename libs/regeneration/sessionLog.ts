/**
 * Session Attempt Log
 *
 * Append-only, in-memory record of every attempt made for one session.
 *
 * INVARIANTS:
 * - Attempt indices start at 0 and increase by exactly 1.
 * - At most one SUCCESS attempt, and it is the last.
 * - Never more attempts than the retry budget.
 * - A non-success attempt always carries its ErrorRecord.
 */

import type { ErrorRecord } from '../classification/errorTypes.js';
import type { ExecutionOutcome } from '../sandbox/types.js';
import type { Attempt, Candidate } from './attempt.js';

export class AttemptLogViolation extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AttemptLogViolation';
        Object.setPrototypeOf(this, AttemptLogViolation.prototype);
    }
}

export class SessionLog {
    private readonly entries: Attempt[] = [];

    constructor(
        public readonly sessionId: string,
        public readonly retryBudget: number,
        private readonly now: () => Date = () => new Date()
    ) {
        if (!Number.isInteger(retryBudget) || retryBudget < 1) {
            throw new RangeError(`retryBudget must be a positive integer, got ${retryBudget}`);
        }
    }

    get length(): number {
        return this.entries.length;
    }

    get last(): Attempt | undefined {
        return this.entries[this.entries.length - 1];
    }

    get succeeded(): boolean {
        return this.last?.outcome.status === 'SUCCESS';
    }

    /**
     * Snapshot of the log; later appends do not show up in it.
     */
    get attempts(): readonly Attempt[] {
        return Object.freeze([...this.entries]);
    }

    record(candidate: Candidate, outcome: ExecutionOutcome, errorRecord?: ErrorRecord): Attempt {
        if (candidate.attemptIndex !== this.entries.length) {
            throw new AttemptLogViolation(
                `Session ${this.sessionId}: expected attempt ${this.entries.length}, got ${candidate.attemptIndex}`
            );
        }
        if (this.entries.length >= this.retryBudget) {
            throw new AttemptLogViolation(
                `Session ${this.sessionId}: retry budget of ${this.retryBudget} already spent`
            );
        }
        if (this.succeeded) {
            throw new AttemptLogViolation(`Session ${this.sessionId}: no attempt may follow a success`);
        }

        const isSuccess = outcome.status === 'SUCCESS';
        if (isSuccess && errorRecord) {
            throw new AttemptLogViolation(`Session ${this.sessionId}: successful attempt cannot carry an error record`);
        }
        if (!isSuccess && !errorRecord) {
            throw new AttemptLogViolation(`Session ${this.sessionId}: failed attempt ${candidate.attemptIndex} has no error record`);
        }

        const attempt = Object.freeze<Attempt>({
            candidate,
            outcome,
            ...(errorRecord ? { errorRecord } : {}),
            recordedAt: this.now().toISOString()
        });
        this.entries.push(attempt);
        return attempt;
    }
}
