/**
 * Logger utility for sectionconf
 *
 * Console output functions that can be silenced when the resolved
 * configuration is written to stdout. Warnings can also be captured by a sink
 * while a block runs, which the `validate` command uses to list them.
 */

export type WarningSink = (message: string) => void;

let silentMode = false;
let warningSink: WarningSink | undefined;

/**
 * Enable or disable silent mode.
 * When enabled, log() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Runs `fn` with every warning routed to `sink` instead of stderr.
 * The previous sink is restored afterwards, even when `fn` throws.
 */
export function withWarningSink<T>(sink: WarningSink, fn: () => T): T {
    const previous = warningSink;
    warningSink = sink;
    try {
        return fn();
    } finally {
        warningSink = previous;
    }
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode unless a sink is installed.
 */
export function warn(...args: unknown[]): void {
    if (warningSink) {
        warningSink(args.map(String).join(' '));
        return;
    }
    if (!silentMode) {
        console.warn(...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
