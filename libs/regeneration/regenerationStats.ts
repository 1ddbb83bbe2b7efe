/**
 * Regeneration Statistics
 *
 * Aggregates session results across runs. Holds no reference to the
 * results themselves, only counters.
 */

import { ERROR_KINDS, type ErrorKind } from '../classification/errorTypes.js';
import type { SessionResult, SessionStatus } from './attempt.js';

export interface ErrorKindCount {
    readonly kind: ErrorKind;
    readonly count: number;
}

export interface StatsSnapshot {
    readonly totalSessions: number;
    readonly byStatus: Readonly<Record<SessionStatus, number>>;
    readonly totalAttempts: number;
    /** Succeeded sessions over all sessions, 0 when none recorded */
    readonly successRate: number;
    readonly averageAttemptsToSuccess: number;
    readonly errorKindCounts: Readonly<Record<ErrorKind, number>>;
    /** Most frequent kinds first, ties in rule priority order */
    readonly mostCommonErrors: readonly ErrorKindCount[];
}

const TOP_ERRORS = 3;

function emptyStatusCounts(): Record<SessionStatus, number> {
    return { SUCCEEDED: 0, EXHAUSTED: 0, CANCELLED: 0, INFRASTRUCTURE_ERROR: 0 };
}

function emptyKindCounts(): Record<ErrorKind, number> {
    return {
        UndefinedSymbol: 0,
        MissingArgument: 0,
        TypeMismatch: 0,
        PatternNoMatch: 0,
        SyntaxError: 0,
        Unclassified: 0
    };
}

export class RegenerationStats {
    private byStatus = emptyStatusCounts();
    private kindCounts = emptyKindCounts();
    private totalAttempts = 0;
    private attemptsToSuccess = 0;

    record(result: SessionResult): void {
        this.byStatus[result.status] += 1;
        this.totalAttempts += result.attempts.length;
        if (result.status === 'SUCCEEDED') {
            this.attemptsToSuccess += result.attempts.length;
        }
        for (const attempt of result.attempts) {
            if (attempt.errorRecord) {
                this.kindCounts[attempt.errorRecord.kind] += 1;
            }
        }
    }

    snapshot(): StatsSnapshot {
        const totalSessions = Object.values(this.byStatus).reduce((sum, n) => sum + n, 0);
        const succeeded = this.byStatus.SUCCEEDED;

        const mostCommonErrors = ERROR_KINDS
            .map(kind => ({ kind, count: this.kindCounts[kind] }))
            .filter(entry => entry.count > 0)
            .sort((a, b) => b.count - a.count)
            .slice(0, TOP_ERRORS);

        return {
            totalSessions,
            byStatus: { ...this.byStatus },
            totalAttempts: this.totalAttempts,
            successRate: totalSessions === 0 ? 0 : succeeded / totalSessions,
            averageAttemptsToSuccess: succeeded === 0 ? 0 : this.attemptsToSuccess / succeeded,
            errorKindCounts: { ...this.kindCounts },
            mostCommonErrors
        };
    }

    reset(): void {
        this.byStatus = emptyStatusCounts();
        this.kindCounts = emptyKindCounts();
        this.totalAttempts = 0;
        this.attemptsToSuccess = 0;
    }
}
