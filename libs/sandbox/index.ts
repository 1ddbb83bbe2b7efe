/**
 * Sandbox Library
 *
 * Exports for candidate execution.
 */

export type {
    ExecutionOutcome,
    InvokeRequest,
    JsonValue,
    OutcomeStatus,
    ProcessResult,
    SandboxInstance,
    SandboxRuntime
} from './types.js';
export type { CandidateExecutor, ExecuteOptions } from './sandboxExecutor.js';
export {
    SandboxExecutor,
    encodeSampleEvents,
    parseOutputDocuments,
    SAMPLE_INPUT_FILE,
    PREFLIGHT_EXIT_CODE
} from './sandboxExecutor.js';
export type { SandboxSlot } from './slotPool.js';
export { SandboxSlotPool } from './slotPool.js';
export type { PreflightResult } from './preflight.js';
export { preflightCheck } from './preflight.js';
export { countExtractedFields, flattenFieldPaths } from './fieldCounter.js';
export type { DockerRuntimeOptions } from './dockerRuntime.js';
export { DockerSandboxRuntime, buildDockerRunArgs } from './dockerRuntime.js';
