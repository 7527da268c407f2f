#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import inquirer from 'inquirer';
import { z } from 'zod';
import { ConfigLoader } from './core/config';
import { createContext, ConfirmFn } from './core/context';
import { ConsoleLogger, QuietLogger, BuildLogger } from './core/logger';
import { logError } from './core/errors';
import { parseRule, RULES } from './core/rules';
import { ProcessRunner } from './shell/runner';
import { dispatch } from './dispatcher';

// src/ and dist/ both sit one level below package.json
const pkg = z.object({ version: z.string() })
    .parse(fs.readJsonSync(path.join(__dirname, '..', 'package.json')));

interface CliOptions {
    strict?: boolean;
    skipUpdate?: boolean;
    confirm?: boolean;
    quiet?: boolean;
    cwd?: string;
    config?: string;
}

const confirmWithPrompt: ConfirmFn = async (message) => {
    const answer = await inquirer.prompt<{ proceed: boolean }>([
        { type: 'confirm', name: 'proceed', message, default: true },
    ]);
    return answer.proceed;
};

const program = new Command();

program
    .name('build')
    .description('Project automation rules: commit/push, run the local app, shut it down, roll back')
    .version(pkg.version)
    .argument('[rule...]', `rule to run (${RULES.join(', ')}); for update, the rest is the commit message`)
    .option('--strict', 'abort a sequence on the first failing step')
    .option('--skip-update', 'exit: do not commit and push before shutting down')
    .option('--confirm', 'exit: ask before committing and pushing')
    .option('-q, --quiet', 'hide progress messages; results (✓), warnings and errors still print')
    .option('-C, --cwd <dir>', 'project directory', process.cwd())
    .option('-c, --config <file>', 'config file (default: build.config.jsonc or build.config.json)')
    .action(async (words: string[], options: CliOptions) => {
        const logger: BuildLogger = options.quiet ? new QuietLogger() : new ConsoleLogger();
        const cwd = path.resolve(options.cwd ?? process.cwd());

        try {
            const config = await new ConfigLoader(cwd, options.config).load();
            const ctx = createContext({
                cwd,
                config,
                logger,
                runner: new ProcessRunner(),
                confirm: confirmWithPrompt,
            });

            await dispatch(parseRule(words), ctx, {
                strict: options.strict,
                skipUpdate: options.skipUpdate,
                confirm: options.confirm,
            });
        } catch (error) {
            logError(logger, error);
            process.exitCode = 1;
        }
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    logError(new ConsoleLogger(), error);
    process.exitCode = 1;
});
