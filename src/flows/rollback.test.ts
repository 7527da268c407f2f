import { describe, it } from 'node:test';
import assert from 'node:assert';
import fs from 'fs-extra';
import { runRollback } from './rollback';
import { StepFailedError } from '../core/errors';
import { FakeRunner, failed, makeTempDir, makeTestContext } from '../testing/fakes';

describe('runRollback (CTLFS)', () => {
    it('reports an empty cache and runs no git command', async () => {
        const cwd = await makeTempDir('rollback-empty');
        const { ctx, runner, logger } = makeTestContext({ cwd });

        const report = await runRollback(ctx);

        assert.deepStrictEqual(report, { status: 'no-cache' });
        assert.deepStrictEqual(logger.messages('warn'), ['No cached branch found.']);
        assert.strictEqual(runner.calls.length, 0);
        await fs.remove(cwd);
    });

    it('checks out and pulls the cached branch', async () => {
        const cwd = await makeTempDir('rollback-cached');
        const { ctx, runner, logger } = makeTestContext({ cwd });
        await ctx.cache.save('release-1');

        const report = await runRollback(ctx);

        assert.deepStrictEqual(report, { status: 'rolled-back', branch: 'release-1' });
        assert.deepStrictEqual(runner.lines(), ['git checkout release-1', 'git pull origin release-1']);
        assert.deepStrictEqual(logger.messages('success'), ['Rolled back to release-1']);
        await fs.remove(cwd);
    });

    it('does not pull after a failed checkout', async () => {
        const cwd = await makeTempDir('rollback-checkout-fails');
        const runner = new FakeRunner().on('git checkout', failed(1, 'error: Your local changes would be overwritten by checkout'));
        const { ctx } = makeTestContext({ cwd, runner });
        await ctx.cache.save('release-1');

        const report = await runRollback(ctx);

        assert.deepStrictEqual(report, { status: 'failed', branch: 'release-1', step: 'git checkout' });
        assert.deepStrictEqual(runner.lines(), ['git checkout release-1']);
        await fs.remove(cwd);
    });

    it('throws in strict mode', async () => {
        const cwd = await makeTempDir('rollback-strict');
        const runner = new FakeRunner().on('git pull', failed(1, 'fatal: couldn\'t find remote ref release-1'));
        const { ctx } = makeTestContext({ cwd, runner });
        await ctx.cache.save('release-1');

        await assert.rejects(() => runRollback(ctx, { strict: true }), StepFailedError);
        await fs.remove(cwd);
    });
});
