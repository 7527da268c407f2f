import { BuildLogger } from './logger';
import type { CommandResult } from '../shell/runner';

/**
 * Base error class for build rules with recovery hints
 */
export class BuildError extends Error {
    constructor(message: string, public recoveryHint?: string) {
        super(message);
        this.name = 'BuildError';
    }

    toString(): string {
        if (this.recoveryHint) {
            return `${this.message}\n💡 Hint: ${this.recoveryHint}`;
        }
        return this.message;
    }
}

/**
 * External tool missing or exited non-zero
 */
export class ToolError extends BuildError {
    constructor(public step: string, public result: Exclude<CommandResult, { kind: 'ok' }>) {
        super(
            `${step} failed: ${describeFailure(result)}`,
            result.kind === 'not-found'
                ? `Install '${result.tool}' and make sure it is on PATH.`
                : undefined
        );
        this.name = 'ToolError';
    }
}

/**
 * --strict abort: a sequence step failed and the rest was skipped
 */
export class StepFailedError extends BuildError {
    constructor(public step: string, detail: string) {
        super(`Step '${step}' failed: ${detail}`, 'Fix the problem above and re-run, or drop --strict to continue past failures.');
        this.name = 'StepFailedError';
    }
}

/**
 * Malformed build.config.json
 */
export class ConfigError extends BuildError {
    constructor(message: string) {
        super(message, 'Check build.config.json against the keys listed in the README.');
        this.name = 'ConfigError';
    }
}

export function describeFailure(result: Exclude<CommandResult, { kind: 'ok' }>): string {
    if (result.kind === 'not-found') {
        return `'${result.tool}' is not installed`;
    }
    const output = (result.stderr || result.stdout).trim();
    return output ? `exit ${result.exitCode}: ${output}` : `exit ${result.exitCode}`;
}

/**
 * Log error with recovery hint
 */
export function logError(logger: BuildLogger, error: unknown): void {
    if (error instanceof BuildError) {
        logger.error(`[ERROR] ${error.message}`);
        if (error.recoveryHint) {
            logger.info(`💡 Hint: ${error.recoveryHint}`);
        }
    } else if (error instanceof Error) {
        logger.error(`[ERROR] ${error.message}`);
    } else {
        logger.error(`[ERROR] ${String(error)}`);
    }
}
