/**
 * In-process stand-ins for the external tools and the console.
 * Used by the *.test.ts files only.
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { BuildConfig, defaultConfig } from '../core/config';
import { BuildContext, ConfirmFn, createContext } from '../core/context';
import { BuildLogger } from '../core/logger';
import { CommandResult, CommandRunner, RunOptions } from '../shell/runner';

export interface RecordedCall {
    /** command and args joined by single spaces */
    line: string;
    command: string;
    args: string[];
    cwd?: string;
    detached: boolean;
}

export type Responder = CommandResult | ((call: RecordedCall) => CommandResult);

export const ok = (stdout = ''): CommandResult => ({ kind: 'ok', stdout, stderr: '' });
export const failed = (exitCode: number, stderr = '', stdout = ''): CommandResult =>
    ({ kind: 'failed', exitCode, stdout, stderr });
export const notFound = (tool: string): CommandResult => ({ kind: 'not-found', tool });

/**
 * Records every call. Responses are matched by line prefix; the most
 * recently registered match wins; unmatched calls succeed with no output.
 */
export class FakeRunner implements CommandRunner {
    calls: RecordedCall[] = [];
    private responders: Array<{ prefix: string; respond: Responder }> = [];

    on(prefix: string, respond: Responder): this {
        this.responders.push({ prefix, respond });
        return this;
    }

    run(command: string, args: string[], options: RunOptions = {}): CommandResult {
        return this.record(command, args, options, false);
    }

    async spawnDetached(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
        return this.record(command, args, options, true);
    }

    lines(): string[] {
        return this.calls.map(c => c.line);
    }

    private record(command: string, args: string[], options: RunOptions, detached: boolean): CommandResult {
        const call: RecordedCall = { line: [command, ...args].join(' '), command, args, cwd: options.cwd, detached };
        this.calls.push(call);
        for (let i = this.responders.length - 1; i >= 0; i--) {
            const { prefix, respond } = this.responders[i];
            if (call.line.startsWith(prefix)) {
                return typeof respond === 'function' ? respond(call) : respond;
            }
        }
        return ok();
    }
}

export type LogLevel = 'info' | 'error' | 'success' | 'warn';

export class RecordingLogger implements BuildLogger {
    entries: Array<{ level: LogLevel; msg: string }> = [];

    info(msg: string): void {
        this.entries.push({ level: 'info', msg });
    }

    error(msg: string): void {
        this.entries.push({ level: 'error', msg });
    }

    success(msg: string): void {
        this.entries.push({ level: 'success', msg });
    }

    warn(msg: string): void {
        this.entries.push({ level: 'warn', msg });
    }

    messages(level?: LogLevel): string[] {
        return this.entries.filter(e => !level || e.level === level).map(e => e.msg);
    }
}

export async function makeTempDir(label: string): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), `build-${label}-`));
}

export interface TestContextOptions {
    cwd: string;
    runner?: FakeRunner;
    config?: Partial<BuildConfig>;
    confirm?: ConfirmFn;
    platform?: NodeJS.Platform;
}

export interface TestContext {
    ctx: BuildContext;
    runner: FakeRunner;
    logger: RecordingLogger;
}

/** Linux defaults unless a platform is given. */
export function makeTestContext(options: TestContextOptions): TestContext {
    const platform = options.platform ?? 'linux';
    const runner = options.runner ?? new FakeRunner();
    const logger = new RecordingLogger();
    const ctx = createContext({
        cwd: options.cwd,
        config: { ...defaultConfig(platform), ...options.config },
        logger,
        runner,
        confirm: options.confirm ?? (async () => true),
        platform,
    });
    return { ctx, runner, logger };
}

/** Responses for a healthy repo on `branch` with an SSH origin. */
export function gitRepo(runner: FakeRunner, branch: string, remoteUrl = 'git@github.com:org/repo.git'): FakeRunner {
    return runner
        .on('git rev-parse', ok(`${branch}\n`))
        .on('git remote get-url', ok(`${remoteUrl}\n`));
}
