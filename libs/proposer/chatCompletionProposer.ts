/**
 * Chat Completion Proposer
 *
 * ScriptProposer backed by an OpenAI-compatible /chat/completions endpoint.
 * Transport, HTTP and response-shape faults surface as
 * InfrastructureError('proposer'); they never count as script failures.
 */

import { InfrastructureError } from '../errors/InfrastructureError.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { ProposalRequest, ScriptProposer } from '../regeneration/proposer.js';
import {
    ChatCompletionResponseSchema,
    ProposerEndpointSchema,
    type ChatCompletionResponse,
    type ProposerEndpoint
} from '../validation/schema.js';
import { createValidator, ValidationViolation } from '../validation/zod-middleware.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

interface ChatMessage {
    readonly role: 'system' | 'user';
    readonly content: string;
}

const SYSTEM_PROMPT = [
    'You write Vector Remap Language (VRL) programs.',
    'Each input event carries one raw log line in its .message field.',
    'Parse it into as many named, structured fields as the line supports.',
    'Reply with a single ```vrl fenced code block and nothing else.'
].join(' ');

const validateCompletion = createValidator(ChatCompletionResponseSchema);
const validateEndpoint = createValidator(ProposerEndpointSchema);

const FENCED_BLOCK = /```([A-Za-z0-9_-]*)[^\n]*\n([\s\S]*?)```/g;

/**
 * The script inside the first vrl-tagged fenced block, else the first
 * fenced block, else the whole reply.
 */
export function extractScript(content: string): string {
    let firstBlock: string | undefined;
    for (const match of content.matchAll(FENCED_BLOCK)) {
        const body = match[2] ?? '';
        if (match[1]?.toLowerCase() === 'vrl') return body.trim();
        firstBlock ??= body;
    }
    return (firstBlock ?? content).trim();
}

export function buildMessages(request: ProposalRequest): ChatMessage[] {
    const sections: string[] = [
        'Sample log lines:',
        ...request.sampleInputs.map(line => `  ${line}`)
    ];

    const context = request.repairContext;
    if (context) {
        sections.push('', `Attempt #${request.attemptIndex} must repair the previous attempt.`);
        sections.push(...context.directives.map(d => `- ${d}`));
        sections.push('', 'Sandbox output of the previous attempt:', context.rawMessage.trim());
        if (!context.regenerateFromScratch && request.priorScript !== undefined) {
            sections.push('', 'Previous script:', '```vrl', request.priorScript, '```');
        }
    } else {
        sections.push('', 'Write a program that extracts every field these lines carry.');
    }

    return [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: sections.join('\n') }
    ];
}

function parseCompletion(body: unknown): ChatCompletionResponse {
    try {
        return validateCompletion(body, 'ChatCompletionResponse');
    } catch (err) {
        if (err instanceof ValidationViolation) {
            throw new InfrastructureError('proposer', 'PROPOSER_BAD_RESPONSE', err.message, { cause: err });
        }
        throw err;
    }
}

export class ChatCompletionProposer implements ScriptProposer {
    private readonly endpoint: ProposerEndpoint;

    constructor(
        endpoint: unknown,
        private readonly fetchImpl: FetchLike = fetch,
        private readonly log: Logger = rootLogger
    ) {
        this.endpoint = validateEndpoint(endpoint, 'ChatCompletionProposer');
    }

    public async propose(request: ProposalRequest, signal: AbortSignal): Promise<string> {
        const url = `${this.endpoint.baseUrl.replace(/\/+$/, '')}/chat/completions`;

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.endpoint.apiKey}`
                },
                body: JSON.stringify({
                    model: this.endpoint.model,
                    temperature: this.endpoint.temperature,
                    messages: buildMessages(request)
                }),
                signal
            });
        } catch (err) {
            // Aborts are mapped to timeout or cancellation by the caller.
            if (signal.aborted) throw err;
            throw new InfrastructureError(
                'proposer',
                'PROPOSER_UNAVAILABLE',
                `Proposer endpoint unreachable: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err }
            );
        }

        if (!response.ok) {
            throw new InfrastructureError(
                'proposer',
                'PROPOSER_UNAVAILABLE',
                `Proposer endpoint returned ${response.status} ${response.statusText}`.trim()
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            throw new InfrastructureError('proposer', 'PROPOSER_BAD_RESPONSE', 'Proposer response is not JSON', { cause: err });
        }

        const parsed = parseCompletion(body);
        const [choice] = parsed.choices;
        const script = extractScript(choice?.message.content ?? '');

        this.log.debug({
            attemptIndex: request.attemptIndex,
            finishReason: choice?.finish_reason,
            promptTokens: parsed.usage?.prompt_tokens,
            completionTokens: parsed.usage?.completion_tokens
        }, 'Proposer responded');

        return script;
    }
}
