/**
 * Docker Sandbox Runtime
 *
 * Each instance is a throwaway working directory plus at most one named
 * container running `vector vrl` with no network, a read-only root and the
 * working directory mounted read-only. Exit codes 125-127 come from the
 * container engine, not the script, and are raised as InfrastructureError.
 */

import { spawn } from 'node:child_process';
import crypto from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { logger } from '../logging/logger.js';
import { InfrastructureError, SessionCancelledError } from '../errors/InfrastructureError.js';
import type { InvokeRequest, ProcessResult, SandboxInstance, SandboxRuntime } from './types.js';

export const CONTAINER_WORKDIR = '/work';
export const PROGRAM_FILE = 'program.vrl';

const PROBE_TIMEOUT_MS = 5000;
const PROBE_TTL_MS = 30_000;
const MAX_CAPTURE_BYTES = 1024 * 1024;

export const TRUNCATION_MARKER = '[output truncated]';

export interface DockerRuntimeOptions {
    readonly dockerBinary: string;
    readonly image: string;
    readonly memoryLimit?: string;
    readonly cpus?: string;
    readonly tmpRoot?: string;
    /** Per-stream capture limit in bytes, default 1 MiB */
    readonly maxCaptureBytes?: number;
}

/**
 * Byte-bounded capture of one child stream. Chunks are kept as raw bytes and
 * decoded once, so a character split across chunks survives intact.
 */
export class OutputCapture {
    private readonly chunks: Buffer[] = [];
    private bytes = 0;
    private truncated = false;

    constructor(private readonly limit: number = MAX_CAPTURE_BYTES) { }

    public push(chunk: Buffer): void {
        const room = this.limit - this.bytes;
        if (chunk.length > room) {
            this.truncated = true;
            if (room <= 0) return;
            chunk = chunk.subarray(0, room);
        }
        this.chunks.push(chunk);
        this.bytes += chunk.length;
    }

    public text(): string {
        // Streaming mode drops a character cut in half by the limit.
        const decoded = new TextDecoder('utf-8').decode(Buffer.concat(this.chunks), { stream: this.truncated });
        return this.truncated ? `${decoded}\n${TRUNCATION_MARKER}` : decoded;
    }
}

/**
 * Arguments for `docker run`; the script and sample are only visible
 * through the read-only mount.
 */
export function buildDockerRunArgs(
    options: DockerRuntimeOptions,
    containerName: string,
    workDir: string,
    sampleFileName: string
): string[] {
    return [
        'run', '--rm',
        '--name', containerName,
        '--network', 'none',
        '--read-only',
        '--memory', options.memoryLimit ?? '256m',
        '--cpus', options.cpus ?? '1',
        '-v', `${workDir}:${CONTAINER_WORKDIR}:ro`,
        '--entrypoint', 'vector',
        options.image,
        'vrl',
        '--input', `${CONTAINER_WORKDIR}/${sampleFileName}`,
        '--program', `${CONTAINER_WORKDIR}/${PROGRAM_FILE}`,
        '--print-object'
    ];
}

interface CommandResult {
    readonly exitCode: number | null;
    readonly stdout: string;
    readonly stderr: string;
}

/**
 * Run a short engine command (probe, force-remove) with its own deadline.
 */
function runCommand(binary: string, args: readonly string[], timeoutMs: number): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
        const child = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        const stdout = new OutputCapture();
        const stderr = new OutputCapture();
        const timer = setTimeout(() => child.kill('SIGKILL'), timeoutMs);

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
        child.on('error', (err) => {
            clearTimeout(timer);
            reject(err);
        });
        child.on('close', (code) => {
            clearTimeout(timer);
            resolve({ exitCode: code, stdout: stdout.text(), stderr: stderr.text() });
        });
    });
}

export class DockerSandboxRuntime implements SandboxRuntime {
    private lastProbeOkAt = 0;

    constructor(private readonly options: DockerRuntimeOptions) { }

    public async acquire(signal?: AbortSignal): Promise<SandboxInstance> {
        if (signal?.aborted) {
            throw new SessionCancelledError();
        }
        await this.probe();

        const workDir = await mkdtemp(path.join(this.options.tmpRoot ?? os.tmpdir(), 'remap-forge-'));
        const id = `remap-forge-${crypto.randomUUID()}`;
        return new DockerSandboxInstance(id, workDir, this.options);
    }

    /**
     * Check the engine answers; a healthy result is reused for PROBE_TTL_MS.
     */
    private async probe(): Promise<void> {
        if (Date.now() - this.lastProbeOkAt < PROBE_TTL_MS) return;

        let result: CommandResult;
        try {
            result = await runCommand(this.options.dockerBinary, ['version', '--format', '{{.Server.Version}}'], PROBE_TIMEOUT_MS);
        } catch (err) {
            throw new InfrastructureError(
                'sandbox',
                'SANDBOX_UNAVAILABLE',
                `Container engine binary '${this.options.dockerBinary}' could not be started: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err }
            );
        }

        if (result.exitCode !== 0) {
            throw new InfrastructureError(
                'sandbox',
                'SANDBOX_UNAVAILABLE',
                `Container engine is not reachable: ${result.stderr.trim() || `exit code ${String(result.exitCode)}`}`
            );
        }

        this.lastProbeOkAt = Date.now();
        logger.debug({ engineVersion: result.stdout.trim() }, 'Container engine probe passed');
    }
}

class DockerSandboxInstance implements SandboxInstance {
    private containerStarted = false;
    private released = false;
    private readonly stagedFiles = new Set<string>();

    constructor(
        public readonly id: string,
        private readonly workDir: string,
        private readonly options: DockerRuntimeOptions
    ) { }

    public async stage(fileName: string, contents: string): Promise<string> {
        const target = path.join(this.workDir, path.basename(fileName));
        await writeFile(target, contents, { encoding: 'utf8', mode: 0o644 });
        this.stagedFiles.add(path.basename(fileName));
        return target;
    }

    public async invoke(request: InvokeRequest): Promise<ProcessResult> {
        const { scriptText, sampleInputPath, timeoutMs, signal } = request;
        if (signal?.aborted) {
            throw new SessionCancelledError();
        }

        await this.stage(PROGRAM_FILE, scriptText);
        const sampleFileName = path.basename(sampleInputPath);
        if (!this.stagedFiles.has(sampleFileName)) {
            throw new Error(`Sample input ${sampleInputPath} was not staged in sandbox ${this.id}`);
        }

        const args = buildDockerRunArgs(this.options, this.id, this.workDir, sampleFileName);
        const result = await this.runContainer(args, timeoutMs, signal);

        if (!result.timedOut && result.exitCode !== null && result.exitCode >= 125 && result.exitCode <= 127) {
            throw new InfrastructureError(
                'sandbox',
                result.exitCode === 125 ? 'SANDBOX_UNAVAILABLE' : 'SANDBOX_CRASHED',
                `Container engine failed to run the sandbox (exit ${result.exitCode}): ${result.stderr.trim()}`
            );
        }
        return result;
    }

    private runContainer(args: readonly string[], timeoutMs: number, signal: AbortSignal | undefined): Promise<ProcessResult> {
        return new Promise<ProcessResult>((resolve, reject) => {
            const child = spawn(this.options.dockerBinary, args, { stdio: ['ignore', 'pipe', 'pipe'] });
            this.containerStarted = true;

            const stdout = new OutputCapture(this.options.maxCaptureBytes);
            const stderr = new OutputCapture(this.options.maxCaptureBytes);
            let timedOut = false;
            let cancelled = false;

            child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
            child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

            const stop = (): void => {
                child.kill('SIGKILL');
                void this.forceRemove();
            };

            const timer = setTimeout(() => {
                timedOut = true;
                stop();
            }, timeoutMs);

            const onAbort = (): void => {
                cancelled = true;
                stop();
            };
            signal?.addEventListener('abort', onAbort, { once: true });

            const settle = (): void => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
            };

            child.on('error', (err) => {
                settle();
                reject(new InfrastructureError(
                    'sandbox',
                    'SANDBOX_UNAVAILABLE',
                    `Container engine binary '${this.options.dockerBinary}' could not be started: ${err.message}`,
                    { cause: err }
                ));
            });

            child.on('close', (code) => {
                settle();
                if (cancelled) {
                    reject(new SessionCancelledError());
                    return;
                }
                resolve({ exitCode: timedOut ? null : code, stdout: stdout.text(), stderr: stderr.text(), timedOut });
            });
        });
    }

    /**
     * Remove the named container if it still exists. Failures are logged:
     * `docker run --rm` normally removes it already.
     */
    private async forceRemove(): Promise<void> {
        if (!this.containerStarted) return;
        try {
            const result = await runCommand(this.options.dockerBinary, ['rm', '-f', this.id], PROBE_TIMEOUT_MS);
            if (result.exitCode !== 0 && !/no such container/i.test(result.stderr)) {
                logger.warn({ sandboxId: this.id, stderr: result.stderr.trim() }, 'Container force-remove reported an error');
            }
        } catch (err) {
            logger.warn({ sandboxId: this.id, error: err instanceof Error ? err.message : String(err) }, 'Container force-remove failed');
        }
    }

    public async release(): Promise<void> {
        if (this.released) return;
        this.released = true;
        await this.forceRemove();
        await rm(this.workDir, { recursive: true, force: true });
    }
}
