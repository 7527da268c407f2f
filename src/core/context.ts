import path from 'path';
import { BuildLogger } from './logger';
import { BuildConfig } from './config';
import { CommandRunner } from '../shell/runner';
import { GitClient } from '../shell/git';
import { BuildCache } from '../shell/cache';
import { ProcessControl, createProcessControl } from '../shell/processes';

export type ConfirmFn = (message: string) => Promise<boolean>;

export interface BuildContext {
    cwd: string;
    config: BuildConfig;

    // Services
    logger: BuildLogger;
    runner: CommandRunner;
    git: GitClient;
    cache: BuildCache;
    processes: ProcessControl;

    /** Yes/no question to the user (inquirer in the CLI). */
    confirm: ConfirmFn;
}

export interface ContextDeps {
    cwd: string;
    config: BuildConfig;
    logger: BuildLogger;
    runner: CommandRunner;
    confirm: ConfirmFn;
    platform?: NodeJS.Platform;
}

/**
 * Wire services from config. The cache path is resolved against cwd here,
 * once, and injected everywhere else.
 */
export function createContext(deps: ContextDeps): BuildContext {
    return {
        cwd: deps.cwd,
        config: deps.config,
        logger: deps.logger,
        runner: deps.runner,
        git: new GitClient(deps.runner, deps.cwd, deps.config.remote),
        cache: new BuildCache(path.resolve(deps.cwd, deps.config.cacheFile)),
        processes: createProcessControl(deps.runner, deps.platform),
        confirm: deps.confirm,
    };
}
