import { z } from 'zod';

/**
 * Central schema definitions for every value that crosses a process
 * boundary: configuration, caller requests and proposer responses.
 */

// --- Configuration ---

export const RegenerationConfigSchema = z.object({
    retryBudget: z.number().int().min(1).max(50).default(5),
    perAttemptTimeoutMs: z.number().int().positive().default(30_000),
    proposerTimeoutMs: z.number().int().positive().default(60_000),
    sandboxConcurrencyLimit: z.number().int().min(1).max(64).default(2),
    sandboxImage: z.string().min(1).default('timberio/vector:0.41.1-alpine'),
    dockerBinary: z.string().min(1).default('docker'),
});

export type RegenerationConfig = z.output<typeof RegenerationConfigSchema>;
export type RegenerationConfigInput = z.input<typeof RegenerationConfigSchema>;

export const ProposerEndpointSchema = z.object({
    baseUrl: z.string().url(),
    apiKey: z.string().min(1),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).default(0.1),
});

export type ProposerEndpoint = z.output<typeof ProposerEndpointSchema>;

// --- Caller Requests ---

export const SessionRequestSchema = z.object({
    sampleInputs: z.array(z.string().min(1)).min(1),
    initialScript: z.string().optional(),
});

export type SessionRequest = z.output<typeof SessionRequestSchema>;

// --- Proposer Responses (OpenAI-compatible chat completion) ---

export const ChatCompletionResponseSchema = z.object({
    choices: z.array(z.object({
        message: z.object({
            role: z.string(),
            content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number().int().nonnegative(),
        completion_tokens: z.number().int().nonnegative(),
    }).optional(),
});

export type ChatCompletionResponse = z.output<typeof ChatCompletionResponseSchema>;
