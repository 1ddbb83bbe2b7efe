/**
 * Sandbox Types
 *
 * Outcome of running one candidate script, plus the runtime boundary the
 * executor drives. The runtime is a black box beyond its I/O contract.
 */

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

/**
 * Outcome status.
 * TIMEOUT never carries a parsed document.
 */
export type OutcomeStatus = 'SUCCESS' | 'FAILURE' | 'TIMEOUT';

export interface ExecutionOutcome {
    readonly status: OutcomeStatus;
    /** Process exit code; null when the process was killed, -1 for a preflight rejection */
    readonly exitCode: number | null;
    readonly stdout: string;
    /** Verbatim stderr of the sandbox process */
    readonly stderr: string;
    /** Union of flattened leaf field paths across all output documents */
    readonly extractedFieldCount: number;
    /** One output document per sample line (SUCCESS only) */
    readonly parsedDocument?: readonly JsonValue[];
    readonly durationMs: number;
}

/**
 * Raw result of one sandbox process.
 */
export interface ProcessResult {
    readonly exitCode: number | null;
    readonly stdout: string;
    readonly stderr: string;
    readonly timedOut: boolean;
}

export interface InvokeRequest {
    readonly scriptText: string;
    readonly sampleInputPath: string;
    readonly timeoutMs: number;
    readonly signal?: AbortSignal;
}

/**
 * One isolated sandbox, acquired per VALIDATE call.
 *
 * invoke() rejects with SessionCancelledError when the signal fires and with
 * InfrastructureError when the runtime itself fails; script failures resolve.
 */
export interface SandboxInstance {
    readonly id: string;
    stage(fileName: string, contents: string): Promise<string>;
    invoke(request: InvokeRequest): Promise<ProcessResult>;
    release(): Promise<void>;
}

export interface SandboxRuntime {
    acquire(signal?: AbortSignal): Promise<SandboxInstance>;
}
