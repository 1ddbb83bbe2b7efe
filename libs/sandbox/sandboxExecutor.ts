/**
 * Sandbox Executor
 *
 * Runs one candidate against the session's sample lines inside an isolated
 * runtime instance and reports a structured outcome. Script failures are
 * outcomes; runtime faults and cancellation are thrown.
 *
 * RESOURCE GUARANTEE:
 * The slot and the instance acquired for a call are released on every exit
 * path, including timeout, crash and cancellation.
 */

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import {
    InfrastructureError,
    SessionCancelledError,
    throwIfCancelled
} from '../errors/InfrastructureError.js';
import type { Candidate } from '../regeneration/attempt.js';
import { countExtractedFields } from './fieldCounter.js';
import { preflightCheck } from './preflight.js';
import type { SandboxSlotPool } from './slotPool.js';
import type {
    ExecutionOutcome,
    JsonValue,
    ProcessResult,
    SandboxInstance,
    SandboxRuntime
} from './types.js';

export const SAMPLE_INPUT_FILE = 'input.jsonl';
export const PREFLIGHT_EXIT_CODE = -1;

export interface ExecuteOptions {
    readonly timeoutMs: number;
    readonly signal?: AbortSignal;
}

/**
 * Anything that can validate a candidate; the controller depends on this only.
 */
export interface CandidateExecutor {
    execute(candidate: Candidate, sampleInputs: readonly string[], options: ExecuteOptions): Promise<ExecutionOutcome>;
}

/**
 * Encode raw sample lines as one JSON event per line, the shape the remap
 * runtime reads its input in.
 */
export function encodeSampleEvents(sampleInputs: readonly string[]): string {
    return sampleInputs.map(message => JSON.stringify({ message })).join('\n') + '\n';
}

type ParsedOutput =
    | { readonly ok: true; readonly documents: JsonValue[]; readonly lineDelimited: boolean }
    | { readonly ok: false; readonly problem: string };

/**
 * Parse sandbox stdout: a single pretty-printed JSON value, or one JSON value
 * per line. Any line that is not JSON is reported verbatim so the classifier
 * sees it.
 */
export function parseOutputDocuments(stdout: string): ParsedOutput {
    const trimmed = stdout.trim();
    if (trimmed === '') {
        return { ok: false, problem: 'sandbox produced no output document' };
    }

    try {
        const whole: JsonValue = JSON.parse(trimmed);
        return { ok: true, documents: [whole], lineDelimited: !trimmed.includes('\n') };
    } catch {
        // Not a single value; fall through to line-delimited parsing.
    }

    const documents: JsonValue[] = [];
    const rejected: string[] = [];
    for (const line of trimmed.split('\n')) {
        if (line.trim() === '') continue;
        try {
            const doc: JsonValue = JSON.parse(line);
            documents.push(doc);
        } catch {
            rejected.push(line);
        }
    }

    if (rejected.length > 0) {
        return { ok: false, problem: rejected.join('\n') };
    }
    return { ok: true, documents, lineDelimited: true };
}

function deepFreeze(value: JsonValue): JsonValue {
    if (value !== null && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

export class SandboxExecutor implements CandidateExecutor {
    constructor(
        private readonly runtime: SandboxRuntime,
        private readonly slots: SandboxSlotPool,
        private readonly log: Logger = rootLogger
    ) { }

    public async execute(
        candidate: Candidate,
        sampleInputs: readonly string[],
        options: ExecuteOptions
    ): Promise<ExecutionOutcome> {
        const { timeoutMs, signal } = options;
        throwIfCancelled(signal);
        const startedAt = Date.now();

        const preflight = preflightCheck(candidate.script);
        if (!preflight.ok) {
            this.log.debug({ attemptIndex: candidate.attemptIndex, problem: preflight.problem }, 'Candidate rejected by preflight');
            return Object.freeze<ExecutionOutcome>({
                status: 'FAILURE',
                exitCode: PREFLIGHT_EXIT_CODE,
                stdout: '',
                stderr: `preflight: syntax error: ${preflight.problem}`,
                extractedFieldCount: 0,
                durationMs: Date.now() - startedAt
            });
        }

        const slot = await this.slots.acquire(signal);
        try {
            const instance = await this.acquireInstance(signal);
            this.log.debug({ attemptIndex: candidate.attemptIndex, sandboxId: instance.id, slot: slot.slotNumber }, 'Sandbox acquired');

            let result: ProcessResult;
            try {
                const sampleInputPath = await instance.stage(SAMPLE_INPUT_FILE, encodeSampleEvents(sampleInputs));
                result = await instance.invoke({
                    scriptText: candidate.script,
                    sampleInputPath,
                    timeoutMs,
                    signal
                });
            } catch (err) {
                throw asSandboxFault(err, 'SANDBOX_CRASHED');
            } finally {
                await this.releaseInstance(instance);
            }

            return toOutcome(result, sampleInputs.length, timeoutMs, Date.now() - startedAt);
        } finally {
            slot.release();
        }
    }

    private async acquireInstance(signal: AbortSignal | undefined): Promise<SandboxInstance> {
        try {
            return await this.runtime.acquire(signal);
        } catch (err) {
            throw asSandboxFault(err, 'SANDBOX_UNAVAILABLE');
        }
    }

    private async releaseInstance(instance: SandboxInstance): Promise<void> {
        try {
            await instance.release();
            this.log.debug({ sandboxId: instance.id }, 'Sandbox released');
        } catch (err) {
            // The outcome (or the error already in flight) stays authoritative.
            this.log.error({
                sandboxId: instance.id,
                error: err instanceof Error ? err.message : String(err)
            }, 'Sandbox teardown failed');
        }
    }
}

function asSandboxFault(err: unknown, code: 'SANDBOX_UNAVAILABLE' | 'SANDBOX_CRASHED'): Error {
    if (err instanceof InfrastructureError || err instanceof SessionCancelledError) {
        return err;
    }
    return new InfrastructureError(
        'sandbox',
        code,
        `Sandbox runtime fault: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
    );
}

function toOutcome(result: ProcessResult, sampleCount: number, timeoutMs: number, durationMs: number): ExecutionOutcome {
    const { exitCode, stdout, stderr } = result;

    if (result.timedOut) {
        return Object.freeze<ExecutionOutcome>({
            status: 'TIMEOUT',
            exitCode,
            stdout,
            stderr: stderr.trim() === '' ? `sandbox execution timed out after ${timeoutMs}ms` : stderr,
            extractedFieldCount: 0,
            durationMs
        });
    }

    if (exitCode !== 0) {
        return Object.freeze<ExecutionOutcome>({ status: 'FAILURE', exitCode, stdout, stderr, extractedFieldCount: 0, durationMs });
    }

    const parsed = parseOutputDocuments(stdout);
    if (!parsed.ok) {
        return Object.freeze<ExecutionOutcome>({
            status: 'FAILURE',
            exitCode,
            stdout,
            stderr: [stderr.trim(), parsed.problem].filter(part => part !== '').join('\n'),
            extractedFieldCount: 0,
            durationMs
        });
    }

    // Every sample line must yield its own document; a line the runtime
    // aborted on only shows up on stderr.
    if (parsed.lineDelimited && parsed.documents.length !== sampleCount) {
        return Object.freeze<ExecutionOutcome>({
            status: 'FAILURE',
            exitCode,
            stdout,
            stderr: [
                stderr.trim(),
                `sandbox produced ${parsed.documents.length} output document(s) for ${sampleCount} sample line(s)`
            ].filter(part => part !== '').join('\n'),
            extractedFieldCount: 0,
            durationMs
        });
    }

    return Object.freeze<ExecutionOutcome>({
        status: 'SUCCESS',
        exitCode,
        stdout,
        stderr,
        extractedFieldCount: countExtractedFields(parsed.documents),
        parsedDocument: Object.freeze(parsed.documents.map(deepFreeze)),
        durationMs
    });
}
