/**
 * Sub-composition — `ctx.compose()` inside a unit body.
 *
 * @internal
 * @module
 */
import { type DiagnosticSink } from '../../observability/Diagnostics.js';
import { type AccumulatedOutcome } from '../types.js';
import { AccumulatingComposer } from './AccumulatingComposer.js';

/** Build, configure and run an anonymous accumulating composer. */
export async function runSubComposition(
    input: Record<string, unknown>,
    configure: (composer: AccumulatingComposer) => void,
    caller: { readonly unitName: string; readonly sink: DiagnosticSink },
): Promise<AccumulatedOutcome> {
    const composer = new AccumulatingComposer({ name: `${caller.unitName}.compose`, sink: caller.sink });
    configure(composer);
    return composer.call(input);
}

/**
 * Entries of `sub` the calling unit takes over: `successful` and its
 * declared outputs, minus those whose value is `undefined` or `null`.
 */
export function selectForCaller(
    sub: AccumulatedOutcome,
    outputKeys: readonly string[],
): Array<[string, unknown]> {
    const selected: Array<[string, unknown]> = [];
    for (const key of ['successful', ...outputKeys]) {
        const value = sub[key];
        if (value !== undefined && value !== null) selected.push([key, value]);
    }
    return selected;
}
