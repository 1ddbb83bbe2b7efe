/**
 * Unit Tests: Chat Completion Proposer
 *
 * The endpoint is replaced by an in-process fetch stand-in.
 *
 * @see libs/proposer/chatCompletionProposer.ts
 */

import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import {
    ChatCompletionProposer,
    buildMessages,
    extractScript,
    type FetchLike
} from '../../libs/proposer/chatCompletionProposer.js';
import { InfrastructureError } from '../../libs/errors/InfrastructureError.js';
import { ValidationViolation } from '../../libs/validation/zod-middleware.js';
import type { ProposalRequest } from '../../libs/regeneration/proposer.js';
import { silentLogger } from '../helpers/harness.js';

const ENDPOINT = {
    baseUrl: 'http://localhost:8080/v1/',
    apiKey: 'test-secret',
    model: 'test-model'
};

const INITIAL_REQUEST: ProposalRequest = {
    sampleInputs: ['GET /health 200', 'POST /login 401'],
    attemptIndex: 0
};

function completion(content: string | null): Response {
    return new Response(JSON.stringify({
        choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 10, completion_tokens: 5 }
    }), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function isProposerFault(code: string, message?: RegExp) {
    return (err: unknown): boolean => {
        assert.ok(err instanceof InfrastructureError);
        assert.strictEqual(err.source, 'proposer');
        assert.strictEqual(err.code, code);
        if (message) assert.match(err.message, message);
        return true;
    };
}

describe('extractScript()', () => {
    it('returns the whole reply when it has no fence', () => {
        assert.strictEqual(extractScript('  .status = 200\n'), '.status = 200');
    });

    it('takes the first fenced block', () => {
        assert.strictEqual(extractScript('Here:\n```\n.a = 1\n```\nthen\n```\n.b = 2\n```'), '.a = 1');
    });

    it('prefers a vrl-tagged block over an earlier untagged one', () => {
        const reply = 'Shape:\n```json\n{"a":1}\n```\nProgram:\n```vrl\n. = parse_json!(.message)\n```';
        assert.strictEqual(extractScript(reply), '. = parse_json!(.message)');
    });
});

describe('buildMessages()', () => {
    it('lists the sample lines for an initial proposal', () => {
        const [system, user] = buildMessages(INITIAL_REQUEST);

        assert.strictEqual(system?.role, 'system');
        assert.strictEqual(user?.content, [
            'Sample log lines:',
            '  GET /health 200',
            '  POST /login 401',
            '',
            'Write a program that extracts every field these lines carry.'
        ].join('\n'));
    });

    it('includes the directives and the previous script for a targeted repair', () => {
        const [, user] = buildMessages({
            ...INITIAL_REQUEST,
            attemptIndex: 1,
            priorScript: '.x = exit',
            repairContext: {
                kind: 'UndefinedSymbol',
                regenerateFromScratch: false,
                directives: ['Replace `exit` with the control-flow keyword `return`.'],
                rawMessage: 'error[E701]: call to undefined variable\n'
            }
        });

        assert.strictEqual(user?.content, [
            'Sample log lines:',
            '  GET /health 200',
            '  POST /login 401',
            '',
            'Attempt #1 must repair the previous attempt.',
            '- Replace `exit` with the control-flow keyword `return`.',
            '',
            'Sandbox output of the previous attempt:',
            'error[E701]: call to undefined variable',
            '',
            'Previous script:',
            '```vrl',
            '.x = exit',
            '```'
        ].join('\n'));
    });

    it('omits the previous script when the repair starts from scratch', () => {
        const [, user] = buildMessages({
            ...INITIAL_REQUEST,
            attemptIndex: 2,
            priorScript: '.x = {',
            repairContext: {
                kind: 'SyntaxError',
                regenerateFromScratch: true,
                directives: ['Discard the previous script and write a new one from scratch.'],
                rawMessage: 'error[E203]: syntax error'
            }
        });

        assert.ok(user);
        assert.ok(user.content.endsWith('Sandbox output of the previous attempt:\nerror[E203]: syntax error'));
    });
});

describe('ChatCompletionProposer', () => {
    it('rejects an invalid endpoint configuration', () => {
        assert.throws(
            () => new ChatCompletionProposer({ ...ENDPOINT, baseUrl: 'not a url' }),
            ValidationViolation
        );
    });

    it('posts the conversation and returns the fenced script', async () => {
        const fetchImpl = mock.fn<FetchLike>(async () => completion('```vrl\n.method = "GET"\n```'));
        const proposer = new ChatCompletionProposer(ENDPOINT, fetchImpl, silentLogger);

        const script = await proposer.propose(INITIAL_REQUEST, new AbortController().signal);

        assert.strictEqual(script, '.method = "GET"');
        assert.strictEqual(fetchImpl.mock.calls.length, 1);

        const call = fetchImpl.mock.calls[0];
        assert.ok(call);
        const [url, init] = call.arguments;
        assert.strictEqual(url, 'http://localhost:8080/v1/chat/completions');
        assert.strictEqual(init.method, 'POST');
        assert.strictEqual(new Headers(init.headers).get('authorization'), 'Bearer test-secret');

        const body: unknown = JSON.parse(String(init.body));
        assert.deepStrictEqual(body, {
            model: 'test-model',
            temperature: 0.1,
            messages: buildMessages(INITIAL_REQUEST)
        });
    });

    it('treats a null content as an empty script', async () => {
        const proposer = new ChatCompletionProposer(ENDPOINT, async () => completion(null), silentLogger);
        assert.strictEqual(await proposer.propose(INITIAL_REQUEST, new AbortController().signal), '');
    });

    it('maps an HTTP failure to PROPOSER_UNAVAILABLE', async () => {
        const proposer = new ChatCompletionProposer(
            ENDPOINT,
            async () => new Response('oops', { status: 500, statusText: 'Internal Server Error' }),
            silentLogger
        );

        await assert.rejects(
            proposer.propose(INITIAL_REQUEST, new AbortController().signal),
            isProposerFault('PROPOSER_UNAVAILABLE', /^Proposer endpoint returned 500 Internal Server Error$/)
        );
    });

    it('maps a transport failure to PROPOSER_UNAVAILABLE', async () => {
        const proposer = new ChatCompletionProposer(
            ENDPOINT,
            async () => { throw new TypeError('fetch failed'); },
            silentLogger
        );

        await assert.rejects(
            proposer.propose(INITIAL_REQUEST, new AbortController().signal),
            isProposerFault('PROPOSER_UNAVAILABLE', /^Proposer endpoint unreachable: fetch failed$/)
        );
    });

    it('rethrows a transport failure unchanged once the signal is aborted', async () => {
        const controller = new AbortController();
        const abortError = new Error('The operation was aborted');
        const proposer = new ChatCompletionProposer(ENDPOINT, async () => {
            controller.abort();
            throw abortError;
        }, silentLogger);

        await assert.rejects(proposer.propose(INITIAL_REQUEST, controller.signal), (err: unknown) => err === abortError);
    });

    it('maps a non-JSON body to PROPOSER_BAD_RESPONSE', async () => {
        const proposer = new ChatCompletionProposer(
            ENDPOINT,
            async () => new Response('<html>gateway</html>', { status: 200 }),
            silentLogger
        );

        await assert.rejects(
            proposer.propose(INITIAL_REQUEST, new AbortController().signal),
            isProposerFault('PROPOSER_BAD_RESPONSE', /^Proposer response is not JSON$/)
        );
    });

    it('maps an unexpected response shape to PROPOSER_BAD_RESPONSE', async () => {
        const proposer = new ChatCompletionProposer(
            ENDPOINT,
            async () => new Response(JSON.stringify({ choices: [] }), { status: 200 }),
            silentLogger
        );

        await assert.rejects(
            proposer.propose(INITIAL_REQUEST, new AbortController().signal),
            isProposerFault('PROPOSER_BAD_RESPONSE')
        );
    });
});
