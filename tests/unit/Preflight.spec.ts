/**
 * Unit Tests: Preflight Check
 *
 * @see libs/sandbox/preflight.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { preflightCheck } from '../../libs/sandbox/preflight.js';

describe('preflightCheck()', () => {
    it('accepts a balanced program', () => {
        assert.deepStrictEqual(preflightCheck('.level = upcase(string!(.severity))\n.tags = [1, 2]'), { ok: true });
    });

    it('rejects an empty program', () => {
        assert.deepStrictEqual(preflightCheck(''), { ok: false, problem: 'empty program' });
    });

    it('treats a program of comments and blank lines as empty', () => {
        assert.deepStrictEqual(preflightCheck('# parse later\n\n   \n'), { ok: false, problem: 'empty program' });
    });

    it('reports an unexpected closer', () => {
        assert.deepStrictEqual(preflightCheck('}\n'), {
            ok: false,
            problem: "unexpected '}' at line 1, column 1"
        });
    });

    it('reports a mismatched closer with both positions', () => {
        assert.deepStrictEqual(preflightCheck('.x = [1, 2)'), {
            ok: false,
            problem: "mismatched ')' at line 1, column 11 closes '[' opened at line 1, column 6"
        });
    });

    it('reports an unclosed block', () => {
        assert.deepStrictEqual(preflightCheck('if .a {\n  .b = 1\n'), {
            ok: false,
            problem: "unclosed '{' opened at line 1, column 7"
        });
    });

    it('reports the innermost unclosed delimiter', () => {
        assert.deepStrictEqual(preflightCheck('.a = {\n  "b": [1,\n'), {
            ok: false,
            problem: "unclosed '[' opened at line 2, column 8"
        });
    });

    it('reports an unterminated string literal', () => {
        assert.deepStrictEqual(preflightCheck('.msg = "unterminated'), {
            ok: false,
            problem: 'unterminated string literal starting at line 1, column 8'
        });
    });

    it('ignores delimiters inside strings, escapes and comments', () => {
        assert.deepStrictEqual(preflightCheck('.a = "{ not a block"'), { ok: true });
        assert.deepStrictEqual(preflightCheck('.a = "say \\"hi\\" ("'), { ok: true });
        assert.deepStrictEqual(preflightCheck('.a = 1 # {'), { ok: true });
    });

    it('ignores delimiters inside regex literals', () => {
        assert.deepStrictEqual(preflightCheck(".m = parse_regex!(.message, r'^(\\d+')"), { ok: true });
    });
});
