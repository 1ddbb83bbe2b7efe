/**
 * Regeneration Controller
 *
 * Bounded generate -> validate -> repair loop for one session.
 *
 * GUARANTEES:
 * - At most retryBudget attempts are recorded.
 * - A failed session never yields a script; no default is substituted.
 * - Infrastructure faults end the session at once and are not counted.
 * - Cancellation keeps every attempt already recorded.
 */

import { randomUUID } from 'node:crypto';

import { defaultClassifier, type ErrorClassifier } from '../classification/errorClassifier.js';
import type { ErrorRecord } from '../classification/errorTypes.js';
import { InfrastructureError, SessionCancelledError } from '../errors/InfrastructureError.js';
import { getSessionLogger, logger as rootLogger, type Logger } from '../logging/logger.js';
import type { CandidateExecutor } from '../sandbox/sandboxExecutor.js';
import type { RegenerationConfig } from '../validation/schema.js';
import { SessionRequestSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import {
    createCandidate,
    type Candidate,
    type InfrastructureFault,
    type SessionResult
} from './attempt.js';
import { requestCandidateScript, type ScriptProposer } from './proposer.js';
import type { RegenerationStats } from './regenerationStats.js';
import { buildRepairContext, type RepairContext } from './repairContext.js';
import { SessionLog } from './sessionLog.js';
import {
    assertTransition,
    isTerminal,
    nextStateAfterValidation,
    type ControllerState
} from './states.js';

export interface RegenerationRequest {
    readonly sampleInputs: readonly string[];
    /** Used as attempt 0 instead of a cold-start proposal */
    readonly initialScript?: string;
    readonly sessionId?: string;
    readonly signal?: AbortSignal;
}

export interface RegenerationControllerDeps {
    readonly executor: CandidateExecutor;
    readonly proposer: ScriptProposer;
    readonly config: RegenerationConfig;
    readonly classifier?: ErrorClassifier;
    readonly logger?: Logger;
    readonly stats?: RegenerationStats;
    readonly now?: () => Date;
}

/**
 * Mutable working state of one run. Never shared between sessions.
 */
interface SessionRun {
    readonly sessionId: string;
    readonly sampleInputs: readonly string[];
    readonly initialScript: string | undefined;
    readonly signal: AbortSignal | undefined;
    readonly log: Logger;
    readonly attempts: SessionLog;
    readonly trail: ControllerState[];
    state: ControllerState;
    candidate?: Candidate;
    lastError?: ErrorRecord;
    repairContext?: RepairContext;
    infrastructureError?: InfrastructureFault;
}

export class RegenerationController {
    private readonly classifier: ErrorClassifier;
    private readonly log: Logger;

    constructor(private readonly deps: RegenerationControllerDeps) {
        this.classifier = deps.classifier ?? defaultClassifier;
        this.log = deps.logger ?? rootLogger;
    }

    public async run(request: RegenerationRequest): Promise<SessionResult> {
        const parsed = validate(SessionRequestSchema, {
            sampleInputs: request.sampleInputs,
            initialScript: request.initialScript
        }, 'RegenerationController.run');

        const sessionId = request.sessionId ?? randomUUID();
        const run: SessionRun = {
            sessionId,
            sampleInputs: Object.freeze([...parsed.sampleInputs]),
            initialScript: parsed.initialScript,
            signal: request.signal,
            log: getSessionLogger(sessionId, this.log),
            attempts: new SessionLog(sessionId, this.deps.config.retryBudget, this.deps.now),
            trail: ['START'],
            state: 'START'
        };

        run.log.info({
            retryBudget: this.deps.config.retryBudget,
            sampleCount: run.sampleInputs.length,
            hasInitialScript: run.initialScript !== undefined
        }, 'Session started');

        while (!isTerminal(run.state)) {
            try {
                await this.step(run);
            } catch (err) {
                if (err instanceof SessionCancelledError) {
                    this.moveTo(run, 'CANCELLED');
                } else if (err instanceof InfrastructureError) {
                    run.infrastructureError = { source: err.source, code: err.code, message: err.message };
                    run.log.error({ source: err.source, code: err.code, error: err.message }, 'Infrastructure fault');
                    this.moveTo(run, 'INFRASTRUCTURE_ERROR');
                } else {
                    throw err;
                }
            }
        }

        const result = this.toResult(run);
        this.deps.stats?.record(result);
        run.log.info({
            status: result.status,
            attempts: result.attempts.length,
            extractedFieldCount: result.extractedFieldCount,
            lastErrorKind: result.lastError?.kind
        }, 'Session finished');
        return result;
    }

    private async step(run: SessionRun): Promise<void> {
        switch (run.state) {
            case 'START':
                this.moveTo(run, 'PROPOSE');
                return;

            case 'PROPOSE': {
                if (run.initialScript !== undefined) {
                    run.candidate = createCandidate(run.initialScript, 0, { kind: 'initial', source: 'caller' });
                } else {
                    const script = await requestCandidateScript(this.deps.proposer, {
                        sampleInputs: run.sampleInputs,
                        attemptIndex: 0
                    }, { timeoutMs: this.deps.config.proposerTimeoutMs, signal: run.signal });
                    run.candidate = createCandidate(script, 0, { kind: 'initial', source: 'proposer' });
                }
                this.logProposed(run, run.candidate);
                this.moveTo(run, 'VALIDATE');
                return;
            }

            case 'VALIDATE': {
                const candidate = this.requireCandidate(run);
                const outcome = await this.deps.executor.execute(candidate, run.sampleInputs, {
                    timeoutMs: this.deps.config.perAttemptTimeoutMs,
                    signal: run.signal
                });
                const errorRecord = this.classifier.classify(outcome) ?? undefined;
                run.attempts.record(candidate, outcome, errorRecord);

                run.log.info({
                    attemptIndex: candidate.attemptIndex,
                    status: outcome.status,
                    exitCode: outcome.exitCode,
                    durationMs: outcome.durationMs,
                    extractedFieldCount: outcome.extractedFieldCount
                }, 'Attempt recorded');

                if (errorRecord) {
                    run.lastError = errorRecord;
                    run.log.info({
                        attemptIndex: candidate.attemptIndex,
                        kind: errorRecord.kind,
                        code: errorRecord.code,
                        symbol: errorRecord.symbol
                    }, 'Failure classified');
                }

                this.moveTo(run, nextStateAfterValidation(outcome.status, run.attempts.length, this.deps.config.retryBudget));
                return;
            }

            case 'ANALYZE': {
                if (!run.lastError) {
                    throw new Error(`Session ${run.sessionId}: ANALYZE entered without a classified failure`);
                }
                run.repairContext = buildRepairContext(run.lastError);
                this.moveTo(run, 'REPAIR_PROPOSE');
                return;
            }

            case 'REPAIR_PROPOSE': {
                const prior = this.requireCandidate(run);
                const attemptIndex = run.attempts.length;
                const script = await requestCandidateScript(this.deps.proposer, {
                    sampleInputs: run.sampleInputs,
                    attemptIndex,
                    ...(run.lastError ? { priorError: run.lastError } : {}),
                    priorScript: prior.script,
                    ...(run.repairContext ? { repairContext: run.repairContext } : {})
                }, { timeoutMs: this.deps.config.proposerTimeoutMs, signal: run.signal });

                run.candidate = createCandidate(script, attemptIndex, { kind: 'repair', repairOf: prior.attemptIndex });
                this.logProposed(run, run.candidate);
                this.moveTo(run, 'VALIDATE');
                return;
            }

            case 'SUCCEEDED':
            case 'EXHAUSTED':
            case 'CANCELLED':
            case 'INFRASTRUCTURE_ERROR':
                return;
        }
    }

    private moveTo(run: SessionRun, next: ControllerState): void {
        assertTransition(run.state, next);
        run.log.debug({ from: run.state, to: next }, 'Controller transition');
        run.state = next;
        run.trail.push(next);
    }

    private requireCandidate(run: SessionRun): Candidate {
        if (!run.candidate) {
            throw new Error(`Session ${run.sessionId}: ${run.state} entered without a candidate`);
        }
        return run.candidate;
    }

    private logProposed(run: SessionRun, candidate: Candidate): void {
        // Script text stays out of info-level logs.
        run.log.info({
            attemptIndex: candidate.attemptIndex,
            provenance: candidate.provenance.kind,
            scriptLength: candidate.script.length
        }, 'Candidate proposed');
        run.log.debug({ attemptIndex: candidate.attemptIndex, script: candidate.script }, 'Candidate script');
    }

    private toResult(run: SessionRun): SessionResult {
        const { state } = run;
        if (!isTerminal(state)) {
            throw new Error(`Session ${run.sessionId} finished in non-terminal state ${state}`);
        }

        const last = run.attempts.last;
        const succeeded = state === 'SUCCEEDED' && last !== undefined;

        return Object.freeze<SessionResult>({
            sessionId: run.sessionId,
            status: state,
            ...(succeeded ? {
                finalScript: last.candidate.script,
                extractedFieldCount: last.outcome.extractedFieldCount
            } : {}),
            attempts: run.attempts.attempts,
            ...(!succeeded && run.lastError ? { lastError: run.lastError } : {}),
            ...(run.infrastructureError ? { infrastructureError: Object.freeze(run.infrastructureError) } : {}),
            stateTrail: Object.freeze([...run.trail])
        });
    }
}
