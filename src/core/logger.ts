export interface BuildLogger {
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements BuildLogger {
    info(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        console.log(`✓ ${msg}`, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        console.warn(msg, ...args);
    }
}

/** --quiet: drops info-level progress; success, warn and error lines still print. */
export class QuietLogger extends ConsoleLogger {
    info(_msg: string, ..._args: unknown[]): void {}
}
