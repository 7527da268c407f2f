import { BuildContext } from '../core/context';
import { StepFailedError, describeFailure } from '../core/errors';

export type RollbackReport =
    | { status: 'no-cache' }
    | { status: 'rolled-back'; branch: string }
    | { status: 'failed'; branch: string; step: string };

/**
 * CTLFS: check out and pull the last branch the update flow pushed.
 */
export async function runRollback(ctx: BuildContext, options: { strict?: boolean } = {}): Promise<RollbackReport> {
    const { git, logger } = ctx;
    const branch = await ctx.cache.load();

    if (branch === null) {
        logger.warn('No cached branch found.');
        return { status: 'no-cache' };
    }

    const steps = [
        { step: 'git checkout', run: () => git.checkout(branch) },
        { step: 'git pull', run: () => git.pull(branch) },
    ];
    for (const { step, run } of steps) {
        const result = run();
        if (result.kind === 'ok') continue;

        const detail = describeFailure(result);
        if (options.strict) {
            throw new StepFailedError(step, detail);
        }
        logger.error(`${step} ${branch} failed: ${detail}`);
        return { status: 'failed', branch, step };
    }

    logger.success(`Rolled back to ${branch}`);
    return { status: 'rolled-back', branch };
}
