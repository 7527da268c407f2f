/**
 * SHELL: Command Runner
 * Every external tool goes through here and comes back as a CommandResult,
 * so callers decide per step whether a failure aborts the sequence.
 */

import { spawn, spawnSync } from 'node:child_process';

export type CommandResult =
    | { kind: 'ok'; stdout: string; stderr: string }
    | { kind: 'not-found'; tool: string }
    | { kind: 'failed'; exitCode: number; stdout: string; stderr: string };

export interface RunOptions {
    cwd?: string;
}

export interface CommandRunner {
    /** Blocks until the tool exits. No timeout. */
    run(command: string, args: string[], options?: RunOptions): CommandResult;
    /** Fire-and-forget: resolves once the child has started (or failed to). */
    spawnDetached(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

export class ProcessRunner implements CommandRunner {
    run(command: string, args: string[], options: RunOptions = {}): CommandResult {
        const result = spawnSync(command, args, {
            cwd: options.cwd,
            encoding: 'utf8',
            stdio: ['inherit', 'pipe', 'pipe'],
            windowsHide: true,
        });

        if (result.error) {
            if (isErrnoException(result.error) && result.error.code === 'ENOENT') {
                return { kind: 'not-found', tool: command };
            }
            return { kind: 'failed', exitCode: -1, stdout: '', stderr: result.error.message };
        }

        const stdout = result.stdout ?? '';
        const stderr = result.stderr ?? '';
        if (result.status !== 0) {
            return { kind: 'failed', exitCode: result.status ?? -1, stdout, stderr };
        }
        return { kind: 'ok', stdout, stderr };
    }

    spawnDetached(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
        return new Promise((resolve) => {
            const child = spawn(command, args, {
                cwd: options.cwd,
                detached: true,
                stdio: 'ignore',
            });
            child.once('spawn', () => {
                child.unref();
                resolve({ kind: 'ok', stdout: '', stderr: '' });
            });
            child.once('error', (err) => {
                if (isErrnoException(err) && err.code === 'ENOENT') {
                    resolve({ kind: 'not-found', tool: command });
                } else {
                    resolve({ kind: 'failed', exitCode: -1, stdout: '', stderr: err.message });
                }
            });
        });
    }
}
