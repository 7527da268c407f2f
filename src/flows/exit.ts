import { BuildContext } from '../core/context';
import { KillOutcome } from '../shell/processes';
import { runUpdateThenContinue, UpdateOptions, UpdateReport } from './update';

export interface ExitOptions extends UpdateOptions {
    /** Skip the commit/push cycle that normally runs first. */
    skipUpdate?: boolean;
    /** Ask before the commit/push cycle. */
    confirm?: boolean;
}

export interface ExitReport {
    update: UpdateReport | null;
    server: KillOutcome;
    portPid: number | null;
    port: KillOutcome;
    windows: KillOutcome;
}

function describe(outcome: KillOutcome): string {
    switch (outcome.status) {
        case 'killed':
            return `stopped ${outcome.count}`;
        case 'none':
            return 'none running';
        case 'error':
            return `failed (${outcome.detail})`;
    }
}

/**
 * Exit flow:
 * 1. commit/push (update flow) unless skipped or declined; a failure here
 *    is logged and the cleanup still runs (unless strict)
 * 2. stop server processes by name
 * 3. free the app port by pid
 * 4. close editor windows titled like the terminal
 * Steps 2-4 are independent; a failure is reported and the next step still runs.
 */
export async function runExit(ctx: BuildContext, options: ExitOptions = {}): Promise<ExitReport> {
    const { config, logger, processes } = ctx;

    let update: UpdateReport | null = null;
    if (options.skipUpdate) {
        logger.info('Skipping commit/push (--skip-update)');
    } else if (options.confirm && !(await ctx.confirm('Commit and push before shutting down?'))) {
        logger.info('Skipping commit/push');
    } else {
        update = await runUpdateThenContinue(ctx, options);
    }

    const server = processes.killByName(config.serverProcessPattern);
    logger.info(`Server processes matching '${config.serverProcessPattern}': ${describe(server)}`);

    let portPid: number | null = null;
    let port: KillOutcome = { status: 'none' };
    const owner = processes.findPortOwner(config.port);
    if (owner.status === 'found') {
        portPid = owner.pid;
        port = processes.killPid(owner.pid);
        logger.info(`Process ${owner.pid} on port ${config.port}: ${describe(port)}`);
    } else if (owner.status === 'none') {
        logger.warn(`No process found on port ${config.port}`);
    } else {
        port = { status: 'error', detail: owner.detail };
        logger.warn(`[WARN] Could not inspect port ${config.port}: ${owner.detail}`);
    }

    const windows = processes.closeWindows(config.windowTitle, config.editorPattern);
    logger.info(`'${config.windowTitle}' windows of '${config.editorPattern}': ${describe(windows)}`);

    return { update, server, portPid, port, windows };
}
