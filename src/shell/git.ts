/**
 * SHELL: Git Adapter
 * Thin wrappers over the git CLI. Each call returns the raw CommandResult;
 * only currentBranch() throws, since nothing downstream works without it.
 */

import { CommandResult, CommandRunner } from './runner';
import { ToolError } from '../core/errors';

export class GitClient {
    private runner: CommandRunner;
    private cwd: string;
    private remote: string;

    constructor(runner: CommandRunner, cwd: string, remote = 'origin') {
        this.runner = runner;
        this.cwd = cwd;
        this.remote = remote;
    }

    /** Symbolic name of the checked-out ref. Throws outside a repository or before the first commit. */
    currentBranch(): string {
        const result = this.git('rev-parse', '--abbrev-ref', 'HEAD');
        if (result.kind !== 'ok') {
            throw new ToolError('git rev-parse', result);
        }
        return result.stdout.trim();
    }

    addAll(): CommandResult {
        return this.git('add', '-A');
    }

    commit(message: string): CommandResult {
        return this.git('commit', '-m', message);
    }

    fetch(): CommandResult {
        return this.git('fetch', this.remote);
    }

    pull(branch: string): CommandResult {
        return this.git('pull', this.remote, branch);
    }

    push(branch: string): CommandResult {
        return this.git('push', this.remote, branch);
    }

    checkout(branch: string): CommandResult {
        return this.git('checkout', branch);
    }

    remoteUrl(): CommandResult {
        return this.git('remote', 'get-url', this.remote);
    }

    getRemote(): string {
        return this.remote;
    }

    private git(...args: string[]): CommandResult {
        return this.runner.run('git', args, { cwd: this.cwd });
    }
}

/** `git commit` exits 1 on a clean tree; that is not a failure worth reporting. */
export function isNothingToCommit(result: CommandResult): boolean {
    return result.kind === 'failed' && /nothing (added )?to commit/i.test(result.stdout + result.stderr);
}
