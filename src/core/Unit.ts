/**
 * Unit — An Atomic, Contract-Declared Piece of Work
 *
 * A `Unit` is what `unit(name)…handle(body)` and `defineUnit()` return.
 * Its definition is fixed when it is constructed; every invocation runs
 * in a fresh execution instance, so a unit may be invoked any number of
 * times, from any number of composers.
 *
 * @example
 * ```typescript
 * const outcome = await debit.call({ account: 'acct-1', amount: 25 });
 * if (!outcome.successful) console.log(outcome.messages);
 *
 * // Or let failures reject:
 * await debit.callStrict({ account: 'acct-1', amount: 25 });
 * ```
 *
 * @module
 */
import { getDiagnosticSink } from '../observability/Diagnostics.js';
import { FailureError, ImplicitConfigurationError } from './errors.js';
import { type CompiledOutput, type CompiledParam } from './builder/ParamDescriptors.js';
import {
    executeUnit,
    type PreconditionDef,
    type SealedDefinition,
    type UnitBody,
} from './execution/UnitExecution.js';
import {
    type CallOptions,
    type ContractedInvocable,
    type Outcome,
    type UnitContract,
    type UnitInput,
} from './types.js';

/**
 * A unit definition as the builders hand it over.
 *
 * `params` or `outputs` left `undefined` means that side of the contract
 * was never declared; such a unit cannot be invoked.
 */
export interface UnitDefinition<TIn extends object, TOut extends object> {
    readonly name: string;
    readonly params: readonly CompiledParam[] | undefined;
    readonly outputs: readonly CompiledOutput[] | undefined;
    readonly precondition: PreconditionDef<TIn> | undefined;
    readonly body: UnitBody<TIn, TOut>;
}

export class Unit<
    TIn extends object = Record<never, never>,
    TOut extends object = Record<never, never>,
> implements ContractedInvocable<TIn, TOut> {
    readonly name: string;
    private readonly _definition: UnitDefinition<TIn, TOut>;

    constructor(definition: UnitDefinition<TIn, TOut>) {
        this.name = definition.name;
        this._definition = Object.freeze({
            ...definition,
            params: definition.params && Object.freeze([...definition.params]),
            outputs: definition.outputs && Object.freeze([...definition.outputs]),
        });
    }

    /**
     * Invoke the unit. Domain failures resolve as an unsuccessful Outcome.
     *
     * @throws {ImplicitConfigurationError} When the contract was never declared
     */
    async call(input: UnitInput<TIn> = {}, options: CallOptions = {}): Promise<Outcome<TOut>> {
        const sealed = this._sealed();
        return executeUnit(sealed, input, options.sink ?? getDiagnosticSink());
    }

    /**
     * Invoke the unit and reject with {@link FailureError} when the
     * Outcome is unsuccessful.
     */
    async callStrict(input: UnitInput<TIn> = {}, options: CallOptions = {}): Promise<Outcome<TOut>> {
        const outcome = await this.call(input, options);
        if (!outcome.successful) throw new FailureError(outcome);
        return outcome;
    }

    describeContract(): UnitContract {
        const { params, outputs, precondition } = this._sealed();
        return {
            name: this.name,
            inputs: params.map((p) => p.key),
            requiredInputs: params.filter((p) => p.required).map((p) => p.key),
            outputs: outputs.map((o) => o.key),
            precondition: precondition?.name,
        };
    }

    private _sealed(): SealedDefinition<TIn, TOut> {
        const { name, params, outputs, precondition, body } = this._definition;
        if (params === undefined || outputs === undefined) {
            throw new ImplicitConfigurationError(name);
        }
        return { name, params, outputs, precondition, body };
    }
}
