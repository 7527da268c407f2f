/**
 * Dispatcher: one rule in, one flow out.
 * `default` is update followed by exit, called in-process.
 */

import { BuildContext } from './core/context';
import { RuleSelection, noRuleMessage } from './core/rules';
import { runUpdate, runUpdateThenContinue, UpdateReport } from './flows/update';
import { runServer, RunReport } from './flows/run';
import { runNodeApp, NodeAppReport } from './flows/node-app';
import { runExit, ExitOptions, ExitReport } from './flows/exit';
import { runRollback, RollbackReport } from './flows/rollback';

export interface DispatchOptions {
    strict?: boolean;
    skipUpdate?: boolean;
    confirm?: boolean;
}

export type DispatchResult =
    | { rule: 'default'; update: UpdateReport | null; exit: ExitReport }
    | { rule: 'update'; update: UpdateReport }
    | { rule: 'run'; run: RunReport }
    | { rule: 'run nodejs'; node: NodeAppReport }
    | { rule: 'exit'; exit: ExitReport }
    | { rule: 'CTLFS'; rollback: RollbackReport }
    | { rule: 'unknown'; target: string };

export async function dispatch(
    selection: RuleSelection,
    ctx: BuildContext,
    options: DispatchOptions = {}
): Promise<DispatchResult> {
    if (selection.kind === 'unknown') {
        ctx.logger.error(noRuleMessage(selection.rule));
        return { rule: 'unknown', target: selection.rule };
    }

    const exitOptions: ExitOptions = {
        strict: options.strict,
        skipUpdate: options.skipUpdate,
        confirm: options.confirm,
    };

    switch (selection.rule) {
        case 'default': {
            const update = await runUpdateThenContinue(ctx, { message: selection.message, strict: options.strict });
            const exit = await runExit(ctx, exitOptions);
            return { rule: 'default', update, exit };
        }
        case 'update':
            return { rule: 'update', update: await runUpdate(ctx, { message: selection.message, strict: options.strict }) };
        case 'run':
            return { rule: 'run', run: await runServer(ctx) };
        case 'run nodejs':
            return { rule: 'run nodejs', node: await runNodeApp(ctx) };
        case 'exit':
            return { rule: 'exit', exit: await runExit(ctx, exitOptions) };
        case 'CTLFS':
            return { rule: 'CTLFS', rollback: await runRollback(ctx, { strict: options.strict }) };
    }
}
