/**
 * In-process stand-ins for the sandbox runtime and the script proposer.
 */

import { SessionCancelledError, throwIfCancelled } from '../../libs/errors/InfrastructureError.js';
import type { ProposalRequest, ScriptProposer } from '../../libs/regeneration/proposer.js';
import type {
    InvokeRequest,
    ProcessResult,
    SandboxInstance,
    SandboxRuntime
} from '../../libs/sandbox/types.js';

export type InvokeHandler = (request: InvokeRequest) => ProcessResult | Promise<ProcessResult>;

export function processSuccess(...documents: unknown[]): ProcessResult {
    return {
        exitCode: 0,
        stdout: documents.map(d => JSON.stringify(d)).join('\n') + '\n',
        stderr: '',
        timedOut: false
    };
}

export function processFailure(stderr: string, exitCode = 1): ProcessResult {
    return { exitCode, stdout: '', stderr, timedOut: false };
}

export function processTimeout(): ProcessResult {
    return { exitCode: null, stdout: '', stderr: '', timedOut: true };
}

/**
 * Rejects with SessionCancelledError once the signal fires.
 */
export function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
    return new Promise<never>((_, reject) => {
        if (!signal) return;
        if (signal.aborted) {
            reject(new SessionCancelledError());
            return;
        }
        signal.addEventListener('abort', () => reject(new SessionCancelledError()), { once: true });
    });
}

class FakeInstance implements SandboxInstance {
    readonly staged = new Map<string, string>();
    private released = false;

    constructor(
        readonly id: string,
        private readonly runtime: FakeSandboxRuntime
    ) { }

    async stage(fileName: string, contents: string): Promise<string> {
        this.staged.set(fileName, contents);
        return `/work/${fileName}`;
    }

    async invoke(request: InvokeRequest): Promise<ProcessResult> {
        this.runtime.invocations.push({
            script: request.scriptText,
            sample: this.staged.get('input.jsonl') ?? '',
            timeoutMs: request.timeoutMs
        });
        return this.runtime.handler(request);
    }

    async release(): Promise<void> {
        if (this.released) return;
        this.released = true;
        this.runtime.released += 1;
    }
}

export interface Invocation {
    readonly script: string;
    readonly sample: string;
    readonly timeoutMs: number;
}

/**
 * Counts every acquire and release so tests can assert nothing leaks.
 */
export class FakeSandboxRuntime implements SandboxRuntime {
    acquired = 0;
    released = 0;
    acquireError: Error | undefined;
    readonly invocations: Invocation[] = [];

    constructor(public handler: InvokeHandler) { }

    get live(): number {
        return this.acquired - this.released;
    }

    async acquire(signal?: AbortSignal): Promise<SandboxInstance> {
        throwIfCancelled(signal);
        if (this.acquireError) throw this.acquireError;
        this.acquired += 1;
        return new FakeInstance(`fake-sandbox-${this.acquired}`, this);
    }
}

export type ScriptedProposal =
    | string
    | Error
    | ((request: ProposalRequest, signal: AbortSignal) => Promise<string>);

/**
 * Answers proposals from a fixed script; records every request.
 */
export class ScriptedProposer implements ScriptProposer {
    readonly requests: ProposalRequest[] = [];
    private readonly queue: ScriptedProposal[];

    constructor(proposals: readonly ScriptedProposal[]) {
        this.queue = [...proposals];
    }

    async propose(request: ProposalRequest, signal: AbortSignal): Promise<string> {
        this.requests.push(request);
        const next = this.queue.shift();
        if (next === undefined) {
            throw new Error('no scripted proposal left');
        }
        if (next instanceof Error) throw next;
        if (typeof next === 'function') return next(request, signal);
        return next;
    }
}
