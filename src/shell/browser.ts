import { CommandRunner } from './runner';
import { BuildLogger } from '../core/logger';
import { describeFailure } from '../core/errors';

/**
 * Open a URL in the configured browser binary. Fire-and-forget.
 * Returns false (after warning) when the browser could not be started.
 */
export async function openInBrowser(
    runner: CommandRunner,
    logger: BuildLogger,
    browser: string,
    url: string
): Promise<boolean> {
    const result = await runner.spawnDetached(browser, [url]);
    if (result.kind === 'ok') {
        logger.info(`Opened ${url}`);
        return true;
    }
    logger.warn(`[WARN] Could not open ${url} with ${browser}: ${describeFailure(result)}`);
    return false;
}
