import { BuildContext } from '../core/context';
import { StepFailedError, describeFailure, logError } from '../core/errors';
import { toBrowsableUrl } from '../core/repo-url';
import { CommandResult } from '../shell/runner';
import { isNothingToCommit } from '../shell/git';
import { openInBrowser } from '../shell/browser';

export interface UpdateOptions {
    message?: string;
    /** Abort on the first failing git step instead of carrying on. */
    strict?: boolean;
}

export interface UpdateReport {
    branch: string;
    cached: boolean;
    url: string | null;
    failedSteps: string[];
}

/**
 * Update flow:
 * add -> commit -> fetch -> pull -> push -> cache branch -> open repo in browser.
 * Pull runs before push; conflicts are left to the user.
 * The branch is cached only when fetch, pull and push all succeeded; a run
 * that completes with a failed remote step warns and leaves the cache alone.
 */
export async function runUpdate(ctx: BuildContext, options: UpdateOptions = {}): Promise<UpdateReport> {
    const { git, logger, config } = ctx;
    const failedSteps: string[] = [];

    const check = (step: string, result: CommandResult): boolean => {
        if (result.kind === 'ok') {
            return true;
        }
        const detail = describeFailure(result);
        if (options.strict) {
            throw new StepFailedError(step, detail);
        }
        logger.warn(`[WARN] ${step} failed, continuing: ${detail}`);
        failedSteps.push(step);
        return false;
    };

    check('git add', git.addAll());

    const message = options.message ?? config.defaultMessage;
    const commit = git.commit(message);
    if (isNothingToCommit(commit)) {
        logger.info('Nothing to commit, working tree clean');
    } else if (check('git commit', commit)) {
        logger.success(`Committed: "${message}"`);
    }

    const branch = git.currentBranch();
    logger.info(`Branch: ${branch}`);

    const fetched = check('git fetch', git.fetch());
    const pulled = check('git pull', git.pull(branch));
    const pushed = check('git push', git.push(branch));

    let cached = false;
    if (fetched && pulled && pushed) {
        logger.success(`Pushed ${branch} to ${git.getRemote()}`);
        await ctx.cache.save(branch);
        cached = true;
    } else {
        logger.warn(`[WARN] Not caching '${branch}': remote sync did not complete`);
    }

    let url: string | null = null;
    const remoteUrl = git.remoteUrl();
    if (check('git remote get-url', remoteUrl) && remoteUrl.kind === 'ok') {
        url = toBrowsableUrl(remoteUrl.stdout);
        await openInBrowser(ctx.runner, logger, config.browser, url);
    }

    return { branch, cached, url, failedSteps };
}

/**
 * Update as the first link of a longer chain (exit, default). Unless strict,
 * a thrown error is logged and null returned so the caller's remaining steps run.
 */
export async function runUpdateThenContinue(ctx: BuildContext, options: UpdateOptions = {}): Promise<UpdateReport | null> {
    try {
        return await runUpdate(ctx, options);
    } catch (error) {
        if (options.strict) {
            throw error;
        }
        logError(ctx.logger, error);
        ctx.logger.warn('[WARN] Commit/push did not complete, continuing');
        return null;
    }
}
