import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseRule, noRuleMessage } from './rules';

describe('parseRule', () => {
    it('treats no words as the default rule', () => {
        assert.deepStrictEqual(parseRule([]), { kind: 'known', rule: 'default' });
        assert.deepStrictEqual(parseRule(['']), { kind: 'known', rule: 'default' });
    });

    it('accepts default spelled out', () => {
        assert.deepStrictEqual(parseRule(['default']), { kind: 'known', rule: 'default' });
    });

    it('takes the rest of the words as the commit message for update', () => {
        assert.deepStrictEqual(parseRule(['update', 'fix', 'typo']), { kind: 'known', rule: 'update', message: 'fix typo' });
        assert.deepStrictEqual(parseRule(['update']), { kind: 'known', rule: 'update' });
    });

    it('recognises run nodejs as two words or one argument', () => {
        assert.deepStrictEqual(parseRule(['run', 'nodejs']), { kind: 'known', rule: 'run nodejs' });
        assert.deepStrictEqual(parseRule(['run nodejs']), { kind: 'known', rule: 'run nodejs' });
        assert.deepStrictEqual(parseRule(['run']), { kind: 'known', rule: 'run' });
    });

    it('selects exit and CTLFS', () => {
        assert.deepStrictEqual(parseRule(['exit']), { kind: 'known', rule: 'exit' });
        assert.deepStrictEqual(parseRule(['CTLFS']), { kind: 'known', rule: 'CTLFS' });
    });

    it('rejects extra words after rules that take none', () => {
        assert.deepStrictEqual(parseRule(['run', 'node']), { kind: 'unknown', rule: 'run node' });
        assert.deepStrictEqual(parseRule(['run', 'nodejs', 'now']), { kind: 'unknown', rule: 'run nodejs now' });
        assert.deepStrictEqual(parseRule(['exit', 'now']), { kind: 'unknown', rule: 'exit now' });
        assert.deepStrictEqual(parseRule(['CTLFS', 'main']), { kind: 'unknown', rule: 'CTLFS main' });
        assert.deepStrictEqual(parseRule(['default', 'x']), { kind: 'unknown', rule: 'default x' });
    });

    it('keeps unknown rules verbatim, case-sensitive', () => {
        assert.deepStrictEqual(parseRule(['deploy']), { kind: 'unknown', rule: 'deploy' });
        assert.deepStrictEqual(parseRule(['ctlfs']), { kind: 'unknown', rule: 'ctlfs' });
        assert.deepStrictEqual(parseRule(['ship', 'it']), { kind: 'unknown', rule: 'ship it' });
    });
});

describe('noRuleMessage', () => {
    it('formats a make-style diagnostic', () => {
        assert.strictEqual(noRuleMessage('deploy'), "build: *** No rule to make target 'deploy'.  Stop.");
    });
});
