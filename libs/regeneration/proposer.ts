/**
 * Script Proposer boundary
 *
 * The proposer is opaque to the loop: a cold start when no prior error is
 * given, a repair otherwise. Every call is bounded by a timeout and the
 * session's AbortSignal.
 */

import {
    InfrastructureError,
    SessionCancelledError,
    throwIfCancelled
} from '../errors/InfrastructureError.js';
import type { ErrorRecord } from '../classification/errorTypes.js';
import type { RepairContext } from './repairContext.js';

export interface ProposalRequest {
    readonly sampleInputs: readonly string[];
    readonly attemptIndex: number;
    readonly priorError?: ErrorRecord;
    readonly priorScript?: string;
    readonly repairContext?: RepairContext;
}

export interface ScriptProposer {
    propose(request: ProposalRequest, signal: AbortSignal): Promise<string>;
}

export interface ProposalOptions {
    readonly timeoutMs: number;
    readonly signal?: AbortSignal;
}

/**
 * Ask the proposer for a script.
 *
 * Throws SessionCancelledError when the session signal fires, and
 * InfrastructureError('proposer') for a timeout or any other proposer fault.
 * A proposer that ignores its signal is abandoned, not awaited.
 */
export async function requestCandidateScript(
    proposer: ScriptProposer,
    request: ProposalRequest,
    options: ProposalOptions
): Promise<string> {
    const { timeoutMs, signal } = options;
    throwIfCancelled(signal);

    const linked = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
        timedOut = true;
        linked.abort();
    }, timeoutMs);
    const forwardAbort = (): void => linked.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const abandoned = new Promise<never>((_, reject) => {
        linked.signal.addEventListener('abort', () => {
            reject(timedOut
                ? new InfrastructureError('proposer', 'PROPOSER_TIMEOUT', `Proposer did not answer within ${timeoutMs}ms`)
                : new SessionCancelledError());
        }, { once: true });
    });

    try {
        return await Promise.race([proposer.propose(request, linked.signal), abandoned]);
    } catch (err) {
        if (signal?.aborted) throw new SessionCancelledError();
        if (timedOut) {
            throw new InfrastructureError('proposer', 'PROPOSER_TIMEOUT', `Proposer did not answer within ${timeoutMs}ms`, { cause: err });
        }
        if (err instanceof InfrastructureError || err instanceof SessionCancelledError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new InfrastructureError('proposer', 'PROPOSER_UNAVAILABLE', `Proposer failed: ${message}`, { cause: err });
    } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', forwardAbort);
    }
}
