/**
 * `run nodejs`: scaffold a minimal Node.js app on first use, start it afterwards.
 * The scaffold is rendered from templates/node-app/*.njk.
 */

import nunjucks from 'nunjucks';
import fs from 'fs-extra';
import path from 'path';
import { BuildContext } from '../core/context';
import { describeFailure } from '../core/errors';

export const NODE_APP_ENTRY = 'index.js';
export const NODE_APP_GREETING = 'Hello from Node.js!';

const TEMPLATE_DIR = path.resolve(__dirname, '../../templates/node-app');

export type NodeAppReport =
    | { action: 'scaffolded'; dir: string; files: string[] }
    | { action: 'started'; dir: string }
    | { action: 'failed'; dir: string; detail: string };

export interface ScaffoldVars {
    name: string;
    description: string;
    entry: string;
    greeting: string;
}

function createEnvironment(): nunjucks.Environment {
    const loader = new nunjucks.FileSystemLoader(TEMPLATE_DIR, { noCache: true });
    return new nunjucks.Environment(loader, {
        autoescape: false,
        throwOnUndefined: true,
    });
}

/** Rendered file contents keyed by file name. */
export function renderScaffold(vars: ScaffoldVars): Record<string, string> {
    const env = createEnvironment();
    try {
        return {
            'package.json': env.render('package.json.njk', vars),
            [vars.entry]: env.render('index.js.njk', vars),
        };
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to render Node.js scaffold from ${TEMPLATE_DIR}: ${reason}`);
    }
}

export async function runNodeApp(ctx: BuildContext): Promise<NodeAppReport> {
    const { config, logger } = ctx;
    const appDir = path.resolve(ctx.cwd, config.nodeAppDir);

    if (!(await fs.pathExists(appDir))) {
        await fs.ensureDir(appDir);
        const files = renderScaffold({
            name: path.basename(appDir),
            description: 'Minimal Node.js application',
            entry: NODE_APP_ENTRY,
            greeting: NODE_APP_GREETING,
        });
        for (const [name, content] of Object.entries(files)) {
            await fs.writeFile(path.join(appDir, name), content);
        }

        logger.success(`Created Node.js project: ${appDir}`);
        logger.info(`Next: build run nodejs`);
        return { action: 'scaffolded', dir: appDir, files: Object.keys(files) };
    }

    const result = await ctx.runner.spawnDetached('node', [NODE_APP_ENTRY], { cwd: appDir });
    if (result.kind !== 'ok') {
        const detail = describeFailure(result);
        logger.error(`Could not start ${NODE_APP_ENTRY}: ${detail}`);
        return { action: 'failed', dir: appDir, detail };
    }

    logger.success(`Started ${path.join(config.nodeAppDir, NODE_APP_ENTRY)}`);
    return { action: 'started', dir: appDir };
}
