/**
 * AccumulatingComposer — Sequential Units with Threaded State
 *
 * Units run in registration order. Each receives the accumulator (the
 * initial input plus every output produced so far); its Outcome is merged
 * back in, with `messages` concatenated. The first unsuccessful unit
 * stops the chain.
 *
 * Before any unit runs, the chain is checked statically: every unit's
 * required inputs must be in the initial input or produced by a unit
 * registered before it.
 *
 * @example
 * ```typescript
 * const transfer = createAccumulatingComposer((c) => {
 *     c.add(debit);   // account, amount → debited
 *     c.add(credit);  // to, amount → credited
 *     c.around((proceed) => ledger.transaction(proceed));
 * }, { name: 'transfer' });
 *
 * const outcome = await transfer.call({ account: 'a', to: 'b', amount: 10 });
 * // { account, to, amount, debited, credited, successful, messages }
 * ```
 *
 * @module
 */
import { renderValue } from '../../observability/Diagnostics.js';
import { FailureError, ReservedParameterError, UnproducedParameterError } from '../errors.js';
import {
    isReservedKey,
    type AccumulatedOutcome,
    type CallOptions,
    type ContractedInvocable,
    type Invocable,
} from '../types.js';
import { ComposerBase, type ComposerOptions } from './ComposerBase.js';

export class AccumulatingComposer extends ComposerBase<ContractedInvocable> implements Invocable {
    constructor(options: ComposerOptions = {}) {
        super('accumulating', options);
    }

    /** Append a unit. Its contract is read when the composer is called. */
    add(unit: ContractedInvocable): this {
        this._registrations.push(unit);
        return this;
    }

    /**
     * Run the chain.
     *
     * @throws {ReservedParameterError} When `input` carries `successful` or `messages`
     * @throws {UnproducedParameterError} When a unit's required input is never available
     */
    async call(input: Record<string, unknown> = {}, options: CallOptions = {}): Promise<AccumulatedOutcome> {
        const initialKeys = Object.keys(input);
        for (const key of initialKeys) {
            if (isReservedKey(key)) throw new ReservedParameterError(key);
        }
        this._assertFeasible(initialKeys.filter((key) => input[key] !== undefined));

        const sink = this._resolveSink(options);
        let accumulator: AccumulatedOutcome = { ...input, successful: true, messages: [] };

        await this._withinScope(async () => {
            for (const unit of this._registrations) {
                const outcome = await unit.call(accumulator, { sink });
                accumulator = {
                    ...accumulator,
                    ...outcome,
                    messages: [...accumulator.messages, ...outcome.messages],
                };
                if (!accumulator.successful) {
                    sink.warn(
                        `Unit ${unit.name} failed within composer "${this.name}"; the remaining units were not run. ` +
                        `Messages: ${renderValue(outcome.messages)}`,
                    );
                    await this._notifyFailure(outcome);
                    break;
                }
            }
        });

        return accumulator;
    }

    /** Run the chain and reject with `FailureError` when it fails. */
    async callStrict(input: Record<string, unknown> = {}, options: CallOptions = {}): Promise<AccumulatedOutcome> {
        const outcome = await this.call(input, options);
        if (!outcome.successful) throw new FailureError(outcome);
        return outcome;
    }

    /** `initialKeys` are the bound input keys: those whose value is not `undefined` */
    private _assertFeasible(initialKeys: readonly string[]): void {
        const available = new Set(initialKeys);
        for (const unit of this._registrations) {
            const contract = unit.describeContract();
            const unproducedKeys = contract.requiredInputs.filter((key) => !available.has(key));
            if (unproducedKeys.length > 0) {
                throw new UnproducedParameterError({
                    unitName: unit.name,
                    composerName: this.name,
                    initialKeys,
                    availableKeys: [...available],
                    unproducedKeys,
                });
            }
            for (const key of contract.outputs) available.add(key);
        }
    }
}

/**
 * Create an accumulating composer.
 *
 * @param configure - Registers units, and optionally sets `around`/`onFailure`
 */
export function createAccumulatingComposer(
    configure?: (composer: AccumulatingComposer) => void,
    options: ComposerOptions = {},
): AccumulatingComposer {
    const composer = new AccumulatingComposer(options);
    configure?.(composer);
    return composer;
}
