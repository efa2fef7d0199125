import type { RepairLogger } from '../src/index.js';

export function consoleLogger(verbose: boolean): RepairLogger {
    return {
        info: verbose ? (msg) => console.error(`[info] ${msg}`) : undefined,
        warn: verbose ? (msg) => console.error(`[warn] ${msg}`) : undefined,
        error: (msg) => console.error(`[error] ${msg}`),
    };
}

/** Runs one pipeline stage, printing the stage name with any failure. */
export function stage<T>(name: string, file: string, run: () => T): T {
    try {
        return run();
    } catch (err: unknown) {
        const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
        throw new Error(`Error ${name} file ${JSON.stringify(file)}: ${message}`, { cause: err });
    }
}
