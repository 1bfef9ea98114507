/**
 * Diagnostics — Process-Wide, Swappable Diagnostic Sink
 *
 * Units and composers report what they did (executed, skipped, failed)
 * through a three-severity sink. Each entry point receives one
 * preformatted line. The default sink writes severity-prefixed lines to
 * standard error; {@link nullSink} discards everything.
 *
 * Every call site resolves its sink as `options.sink ?? getDiagnosticSink()`,
 * so a sink can be injected per call or per composer, or swapped for the
 * whole process.
 *
 * @example
 * ```typescript
 * import { createConsoleSink, setDiagnosticSink, silence } from 'unitflow';
 *
 * // Route diagnostics to a custom writer
 * setDiagnosticSink(createConsoleSink((line) => logger.debug(line)));
 *
 * // Run a block with diagnostics suppressed
 * await silence(() => transfer.call({ from: 'a', to: 'b', amount: 10 }));
 * ```
 *
 * @module
 */
import { inspect } from 'node:util';

// ============================================================================
// Sink Contract
// ============================================================================

/**
 * A diagnostic sink.
 *
 * Structural: any object with these three methods (a pino or winston
 * logger, a test spy) can be passed where a sink is expected.
 */
export interface DiagnosticSink {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/** Severity prefixes used by the console sink */
const PREFIX = {
    info: 'INFO: ',
    warn: 'WARNING: ',
    error: 'ERROR: ',
} as const;

// ============================================================================
// Factories
// ============================================================================

/**
 * Create a sink that writes `INFO: …`, `WARNING: …` and `ERROR: …` lines.
 *
 * @param write - Line writer. Defaults to `console.error` (standard error).
 */
export function createConsoleSink(write?: (line: string) => void): DiagnosticSink {
    const out = write ?? ((line: string) => console.error(line));
    return {
        info: (message) => out(`${PREFIX.info}${message}`),
        warn: (message) => out(`${PREFIX.warn}${message}`),
        error: (message) => out(`${PREFIX.error}${message}`),
    };
}

/** A sink that discards every line. */
export const nullSink: DiagnosticSink = Object.freeze({
    info: () => {},
    warn: () => {},
    error: () => {},
});

// ============================================================================
// Process-Wide Sink
// ============================================================================

let currentSink: DiagnosticSink = createConsoleSink();

/** The process-wide sink used when no sink is injected. */
export function getDiagnosticSink(): DiagnosticSink {
    return currentSink;
}

/**
 * Replace the process-wide sink.
 *
 * @returns The sink that was displaced
 */
export function setDiagnosticSink(sink: DiagnosticSink): DiagnosticSink {
    const displaced = currentSink;
    currentSink = sink;
    return displaced;
}

/**
 * Run `fn` with `sink` installed as the process-wide sink.
 *
 * The displaced sink is restored when `fn` settles, whether it returns,
 * throws or rejects. The override is process-wide for its whole duration:
 * unrelated work interleaved with an async `fn` reports to `sink` too.
 */
export async function withDiagnosticSink<T>(
    sink: DiagnosticSink,
    fn: () => T | Promise<T>,
): Promise<T> {
    const displaced = setDiagnosticSink(sink);
    try {
        return await fn();
    } finally {
        currentSink = displaced;
    }
}

/** Run `fn` with diagnostics suppressed. */
export function silence<T>(fn: () => T | Promise<T>): Promise<T> {
    return withDiagnosticSink(nullSink, fn);
}

// ============================================================================
// Formatting
// ============================================================================

/** Render any value on a single line, as diagnostic lines show it. */
export function renderValue(value: unknown): string {
    return inspect(value, { depth: 2, breakLength: Infinity });
}

/** Maximum rendered length of one previewed value */
const PREVIEW_VALUE_LENGTH = 51;

/**
 * Render bound inputs for a diagnostic line.
 *
 * Each value is rendered with `util.inspect` on a single line and cut to
 * {@link PREVIEW_VALUE_LENGTH} characters. Reserved outcome keys are left out.
 *
 * ```
 * { amount: 100, from: 'acct-1' }
 * ```
 */
export function previewInputs(input: Readonly<Record<string, unknown>>): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(input)) {
        if (key === 'successful' || key === 'messages') continue;
        parts.push(`${key}: ${renderValue(value).slice(0, PREVIEW_VALUE_LENGTH)}`);
    }
    return parts.length > 0 ? `{ ${parts.join(', ')} }` : '{}';
}
