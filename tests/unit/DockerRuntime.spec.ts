/**
 * Unit Tests: Docker Sandbox Runtime
 *
 * Uses a shell script standing in for the container engine binary.
 *
 * @see libs/sandbox/dockerRuntime.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { chmod, mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DockerSandboxRuntime, OutputCapture, TRUNCATION_MARKER, buildDockerRunArgs } from '../../libs/sandbox/dockerRuntime.js';
import { InfrastructureError } from '../../libs/errors/InfrastructureError.js';

let scratch: string;

async function fakeEngine(name: string, runBody: string, versionBody = 'echo "24.0.7"; exit 0'): Promise<string> {
    const file = path.join(scratch, name);
    await writeFile(file, [
        '#!/bin/sh',
        'case "$1" in',
        `  version) ${versionBody};;`,
        '  rm) exit 0;;',
        `  run) ${runBody};;`,
        'esac',
        'exit 2',
        ''
    ].join('\n'));
    await chmod(file, 0o755);
    return file;
}

async function freshTmpRoot(name: string): Promise<string> {
    const dir = path.join(scratch, name);
    await mkdir(dir);
    return dir;
}

describe('DockerSandboxRuntime', () => {
    before(async () => {
        scratch = await mkdtemp(path.join(os.tmpdir(), 'docker-runtime-'));
    });

    after(async () => {
        await rm(scratch, { recursive: true, force: true });
    });

    describe('buildDockerRunArgs()', () => {
        it('isolates the container and mounts the work directory read-only', () => {
            const args = buildDockerRunArgs(
                { dockerBinary: 'docker', image: 'vector:test' },
                'remap-forge-1',
                '/tmp/work-1',
                'input.jsonl'
            );

            assert.deepStrictEqual(args, [
                'run', '--rm',
                '--name', 'remap-forge-1',
                '--network', 'none',
                '--read-only',
                '--memory', '256m',
                '--cpus', '1',
                '-v', '/tmp/work-1:/work:ro',
                '--entrypoint', 'vector',
                'vector:test',
                'vrl',
                '--input', '/work/input.jsonl',
                '--program', '/work/program.vrl',
                '--print-object'
            ]);
        });

        it('applies resource limit overrides', () => {
            const args = buildDockerRunArgs(
                { dockerBinary: 'docker', image: 'vector:test', memoryLimit: '64m', cpus: '0.5' },
                'c', '/w', 'in.jsonl'
            );
            assert.strictEqual(args[args.indexOf('--memory') + 1], '64m');
            assert.strictEqual(args[args.indexOf('--cpus') + 1], '0.5');
        });
    });

    describe('OutputCapture', () => {
        it('keeps a multi-byte character split across chunks', () => {
            const euro = Buffer.from('€', 'utf8');
            const capture = new OutputCapture();
            capture.push(euro.subarray(0, 1));
            capture.push(euro.subarray(1));

            assert.strictEqual(capture.text(), '€');
        });

        it('caps by bytes and marks the truncation', () => {
            const capture = new OutputCapture(10);
            capture.push(Buffer.from('€€€€€', 'utf8'));
            capture.push(Buffer.from('more', 'utf8'));

            assert.strictEqual(capture.text(), `€€€\n${TRUNCATION_MARKER}`);
        });
    });

    describe('acquire()', () => {
        it('raises SANDBOX_UNAVAILABLE when the engine binary is missing', async () => {
            const runtime = new DockerSandboxRuntime({ dockerBinary: path.join(scratch, 'no-such-engine'), image: 'vector:test' });

            await assert.rejects(runtime.acquire(), (err: unknown) =>
                err instanceof InfrastructureError && err.code === 'SANDBOX_UNAVAILABLE');
        });

        it('raises SANDBOX_UNAVAILABLE when the daemon does not answer', async () => {
            const engine = await fakeEngine('engine-down', 'exit 0', 'echo "Cannot connect to the daemon" >&2; exit 1');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test' });

            await assert.rejects(runtime.acquire(), {
                name: 'InfrastructureError',
                code: 'SANDBOX_UNAVAILABLE',
                message: 'Container engine is not reachable: Cannot connect to the daemon'
            });
        });
    });

    describe('instances', () => {
        it('runs the program and removes its work directory on release', async () => {
            const engine = await fakeEngine('engine-ok', `echo '{"message":"a","host":"web-1"}'; exit 0`);
            const tmpRoot = await freshTmpRoot('ok');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test', tmpRoot });

            const instance = await runtime.acquire();
            const samplePath = await instance.stage('input.jsonl', '{"message":"a"}\n');
            const result = await instance.invoke({ scriptText: '.host = "web-1"', sampleInputPath: samplePath, timeoutMs: 5000 });

            assert.deepStrictEqual(result, {
                exitCode: 0,
                stdout: '{"message":"a","host":"web-1"}\n',
                stderr: '',
                timedOut: false
            });
            assert.strictEqual((await readdir(tmpRoot)).length, 1);

            await instance.release();
            await instance.release();
            assert.deepStrictEqual(await readdir(tmpRoot), []);
        });

        it('decodes large multi-byte output without replacement characters', async () => {
            const payload = path.join(scratch, 'euro.json');
            const field = '€'.repeat(30_000);
            await writeFile(payload, `${JSON.stringify({ m: field })}\n`, 'utf8');
            const engine = await fakeEngine('engine-multibyte', `cat '${payload}'; exit 0`);
            const tmpRoot = await freshTmpRoot('multibyte');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test', tmpRoot });

            const instance = await runtime.acquire();
            try {
                const samplePath = await instance.stage('input.jsonl', '{"message":"a"}\n');
                const result = await instance.invoke({ scriptText: '.m = "x"', sampleInputPath: samplePath, timeoutMs: 5000 });
                const parsed: unknown = JSON.parse(result.stdout);
                assert.deepStrictEqual(parsed, { m: field });
            } finally {
                await instance.release();
            }
        });

        it('truncates output past the capture limit', async () => {
            const engine = await fakeEngine('engine-chatty', `printf '€€€€€'; exit 0`);
            const tmpRoot = await freshTmpRoot('chatty');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test', tmpRoot, maxCaptureBytes: 10 });

            const instance = await runtime.acquire();
            try {
                const samplePath = await instance.stage('input.jsonl', '{"message":"a"}\n');
                const result = await instance.invoke({ scriptText: '.a = 1', sampleInputPath: samplePath, timeoutMs: 5000 });
                assert.strictEqual(result.stdout, `€€€\n${TRUNCATION_MARKER}`);
            } finally {
                await instance.release();
            }
        });

        it('passes script failures through as a process result', async () => {
            const engine = await fakeEngine('engine-script-error', 'echo "error[E701]: call to undefined variable" >&2; exit 1');
            const tmpRoot = await freshTmpRoot('script-error');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test', tmpRoot });

            const instance = await runtime.acquire();
            try {
                const samplePath = await instance.stage('input.jsonl', '{"message":"a"}\n');
                const result = await instance.invoke({ scriptText: 'exit', sampleInputPath: samplePath, timeoutMs: 5000 });
                assert.strictEqual(result.exitCode, 1);
                assert.strictEqual(result.stderr, 'error[E701]: call to undefined variable\n');
            } finally {
                await instance.release();
            }
        });

        it('raises an infrastructure fault for engine exit code 125', async () => {
            const engine = await fakeEngine('engine-125', 'echo "Unable to find image" >&2; exit 125');
            const tmpRoot = await freshTmpRoot('125');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test', tmpRoot });

            const instance = await runtime.acquire();
            try {
                const samplePath = await instance.stage('input.jsonl', '{"message":"a"}\n');
                await assert.rejects(
                    instance.invoke({ scriptText: '.a = 1', sampleInputPath: samplePath, timeoutMs: 5000 }),
                    { code: 'SANDBOX_UNAVAILABLE', message: 'Container engine failed to run the sandbox (exit 125): Unable to find image' }
                );
            } finally {
                await instance.release();
            }
        });

        it('reports a timeout when the container outlives its deadline', async () => {
            const engine = await fakeEngine('engine-slow', 'exec sleep 5');
            const tmpRoot = await freshTmpRoot('slow');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test', tmpRoot });

            const instance = await runtime.acquire();
            try {
                const samplePath = await instance.stage('input.jsonl', '{"message":"a"}\n');
                const result = await instance.invoke({ scriptText: '.a = 1', sampleInputPath: samplePath, timeoutMs: 100 });
                assert.strictEqual(result.timedOut, true);
                assert.strictEqual(result.exitCode, null);
            } finally {
                await instance.release();
            }
        });

        it('refuses to run without a staged sample', async () => {
            const engine = await fakeEngine('engine-unstaged', 'exit 0');
            const tmpRoot = await freshTmpRoot('unstaged');
            const runtime = new DockerSandboxRuntime({ dockerBinary: engine, image: 'vector:test', tmpRoot });

            const instance = await runtime.acquire();
            try {
                await assert.rejects(
                    instance.invoke({ scriptText: '.a = 1', sampleInputPath: '/work/input.jsonl', timeoutMs: 5000 }),
                    /was not staged/
                );
            } finally {
                await instance.release();
            }
        });
    });
});
