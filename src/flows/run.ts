import fs from 'fs-extra';
import path from 'path';
import { BuildContext } from '../core/context';
import { describeFailure } from '../core/errors';
import { openInBrowser } from '../shell/browser';

export type RunReport =
    | { project: 'python'; started: boolean; url: string }
    | { project: 'unsupported' };

/**
 * Python projects only (detected by the requirements file): start waitress
 * detached and open the local URL. Anything else gets pointed at `run nodejs`.
 */
export async function runServer(ctx: BuildContext): Promise<RunReport> {
    const { config, logger } = ctx;
    const marker = path.join(ctx.cwd, config.requirementsFile);

    if (!(await fs.pathExists(marker))) {
        logger.info(`No ${config.requirementsFile} found. For a Node.js project use: build run nodejs`);
        return { project: 'unsupported' };
    }

    const url = `http://${config.host}:${config.port}`;
    const result = await ctx.runner.spawnDetached(
        'waitress-serve',
        [`--host=${config.host}`, `--port=${config.port}`, config.wsgiApp],
        { cwd: ctx.cwd }
    );

    if (result.kind !== 'ok') {
        logger.error(`Could not start waitress-serve: ${describeFailure(result)}`);
        return { project: 'python', started: false, url };
    }

    logger.success(`Serving ${config.wsgiApp} on ${url}`);
    await openInBrowser(ctx.runner, logger, config.browser, url);
    return { project: 'python', started: true, url };
}
