import { processConfig, type ProcessConfigOptions } from '../src/config/process-config';
import { fixedHostDefaults } from '../src/config/host-defaults';
import type { ResolvedConfig } from '../src/config/types';
import { withWarningSink } from '../src/output/logger';
import type { RawDocument } from '../src/types/raw';

// 8 cores and a heap limit that gives a max-command-size of 1000
export const TEST_HOST = fixedHostDefaults(8, 205 * 1000);

/**
 * Runs `fn` and returns what it threw, failing the test when it returns.
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e: unknown) {
        return e;
    }
    throw new Error('expected the call to throw');
}

/**
 * Runs `fn` collecting every warning it logs.
 */
export function collectWarnings<T>(fn: () => T): { result: T; warnings: string[] } {
    const warnings: string[] = [];
    const result = withWarningSink((message) => warnings.push(message), fn);
    return { result, warnings };
}

/**
 * Resolves a document that is expected to produce a configuration.
 */
export function resolveDocument(document: RawDocument, options: ProcessConfigOptions = {}): ResolvedConfig {
    const result = processConfig(document, { hostDefaults: TEST_HOST, ...options });
    if (!result.ok) {
        throw new Error(`unexpected fatal issues: ${result.fatal.map((f) => f.key).join(', ')}`);
    }
    return result.config;
}
