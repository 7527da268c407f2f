/**
 * SHELL: Process Control
 * Kill-by-name, port owner lookup and window cleanup, one implementation per OS family.
 * "Nothing matched" is a normal outcome, not an error.
 */

import { CommandResult, CommandRunner } from './runner';
import { describeFailure } from '../core/errors';

export type KillOutcome =
    | { status: 'killed'; count: number }
    | { status: 'none' }
    | { status: 'error'; detail: string };

export type PortLookup =
    | { status: 'found'; pid: number }
    | { status: 'none' }
    | { status: 'error'; detail: string };

export interface ProcessControl {
    killByName(pattern: string): KillOutcome;
    findPortOwner(port: number): PortLookup;
    killPid(pid: number): KillOutcome;
    closeWindows(titlePattern: string, processPattern: string): KillOutcome;
}

export interface WindowEntry {
    pid: number;
    title: string;
}

function failure(result: Exclude<CommandResult, { kind: 'ok' }>): KillOutcome {
    return { status: 'error', detail: describeFailure(result) };
}

function parsePid(text: string): number | null {
    const pid = parseInt(text, 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/**
 * `lsof -t` prints one pid per line; first listener wins.
 */
export function parseLsofPid(output: string): number | null {
    for (const line of output.split('\n')) {
        const pid = parsePid(line.trim());
        if (pid !== null) return pid;
    }
    return null;
}

/**
 * `netstat -ano` rows: Proto  Local  Foreign  [State]  PID.
 * Only rows whose local address ends in :<port> count.
 */
export function parseNetstatPid(output: string, port: number): number | null {
    for (const line of output.split(/\r?\n/)) {
        const columns = line.trim().split(/\s+/);
        if (columns.length < 4) continue;
        if (!columns[1].endsWith(`:${port}`)) continue;
        const pid = parsePid(columns[columns.length - 1]);
        if (pid !== null) return pid;
    }
    return null;
}

/**
 * `wmctrl -lp` rows: <window id> <desktop> <pid> <host> <title...>
 */
export function parseWmctrlWindows(output: string): WindowEntry[] {
    const windows: WindowEntry[] = [];
    for (const line of output.split('\n')) {
        const columns = line.trim().split(/\s+/);
        if (columns.length < 5) continue;
        const pid = parsePid(columns[2]);
        if (pid === null) continue;
        windows.push({ pid, title: columns.slice(4).join(' ') });
    }
    return windows;
}

export class PosixProcessControl implements ProcessControl {
    constructor(private runner: CommandRunner) {}

    killByName(pattern: string): KillOutcome {
        const result = this.runner.run('pkill', ['-f', pattern]);
        if (result.kind === 'ok') return { status: 'killed', count: 1 };
        // pkill: 1 = no process matched
        if (result.kind === 'failed' && result.exitCode === 1) return { status: 'none' };
        return failure(result);
    }

    findPortOwner(port: number): PortLookup {
        const result = this.runner.run('lsof', ['-t', '-i', `tcp:${port}`, '-sTCP:LISTEN']);
        if (result.kind === 'ok') {
            const pid = parseLsofPid(result.stdout);
            return pid === null ? { status: 'none' } : { status: 'found', pid };
        }
        // lsof: 1 with no output = nothing listening
        if (result.kind === 'failed' && result.exitCode === 1 && !result.stderr.trim()) {
            return { status: 'none' };
        }
        return { status: 'error', detail: describeFailure(result) };
    }

    killPid(pid: number): KillOutcome {
        const result = this.runner.run('kill', ['-9', String(pid)]);
        return result.kind === 'ok' ? { status: 'killed', count: 1 } : failure(result);
    }

    closeWindows(titlePattern: string, processPattern: string): KillOutcome {
        const listing = this.runner.run('wmctrl', ['-lp']);
        if (listing.kind !== 'ok') return failure(listing);

        const pids = new Set(
            parseWmctrlWindows(listing.stdout)
                .filter(w => w.title.includes(titlePattern))
                .map(w => w.pid)
        );

        const wanted = processPattern.toLowerCase();
        let count = 0;
        for (const pid of pids) {
            const ps = this.runner.run('ps', ['-p', String(pid), '-o', 'comm=']);
            if (ps.kind !== 'ok' || !ps.stdout.trim().toLowerCase().includes(wanted)) continue;
            if (this.killPid(pid).status === 'killed') count++;
        }
        return count > 0 ? { status: 'killed', count } : { status: 'none' };
    }
}

/** taskkill exits 128 when no process matches. */
const TASKKILL_NOT_FOUND = 128;

export class WindowsProcessControl implements ProcessControl {
    constructor(private runner: CommandRunner) {}

    killByName(pattern: string): KillOutcome {
        return this.taskkill(['/F', '/IM', `${pattern}*`]);
    }

    findPortOwner(port: number): PortLookup {
        const result = this.runner.run('netstat', ['-ano']);
        if (result.kind !== 'ok') return { status: 'error', detail: describeFailure(result) };
        const pid = parseNetstatPid(result.stdout, port);
        return pid === null ? { status: 'none' } : { status: 'found', pid };
    }

    killPid(pid: number): KillOutcome {
        return this.taskkill(['/F', '/PID', String(pid)]);
    }

    closeWindows(titlePattern: string, processPattern: string): KillOutcome {
        return this.taskkill(['/F', '/FI', `WINDOWTITLE eq ${titlePattern}*`, '/IM', `${processPattern}*`]);
    }

    private taskkill(args: string[]): KillOutcome {
        const result = this.runner.run('taskkill', args);
        if (result.kind === 'ok') {
            const count = (result.stdout.match(/SUCCESS/g) ?? []).length;
            return { status: 'killed', count: Math.max(count, 1) };
        }
        if (result.kind === 'failed' && result.exitCode === TASKKILL_NOT_FOUND) return { status: 'none' };
        return failure(result);
    }
}

export function createProcessControl(runner: CommandRunner, platform: NodeJS.Platform = process.platform): ProcessControl {
    return platform === 'win32' ? new WindowsProcessControl(runner) : new PosixProcessControl(runner);
}
