/**
 * defineUnit() — Config-Object Unit Definition
 *
 * The declarative shorthand for `unit(name)`. Write one config object;
 * the input contract comes either from a `params` descriptor map or from
 * the shape of a Zod object `schema` (optional fields become optional
 * keys). Omitting both declares no inputs, omitting `result` declares no
 * outputs. The unit produced is identical to the one the fluent builder
 * produces for the same declarations.
 *
 * @example
 * ```typescript
 * import { defineUnit } from 'unitflow';
 *
 * export const credit = defineUnit('credit', {
 *     schema: z.object({ account: z.string(), amount: z.number(), memo: z.string().optional() }),
 *     result: ['balance'],
 *     handler: async ({ input }) => ({ balance: await ledger.credit(input.account, input.amount) }),
 * });
 * ```
 *
 * @see {@link unit} for the fluent builder API
 *
 * @module
 */
import { type z, type ZodObject, type ZodRawShape } from 'zod';
import { DualParameterDefinitionError } from '../errors.js';
import { Unit } from '../Unit.js';
import { type PreconditionContext, type PreconditionDef, type UnitBody } from '../execution/UnitExecution.js';
import {
    compileOutputs,
    compileParams,
    deriveParamsFromSchema,
    type InferParams,
    type ParamsMap,
} from './ParamDescriptors.js';

// ============================================================================
// Config Types
// ============================================================================

type PreconditionFn<TIn extends object> = (ctx: PreconditionContext<TIn>) => unknown;

/**
 * Config accepted by {@link defineUnit}.
 *
 * @typeParam TParams - Descriptor map, inferred from `params`
 * @typeParam TShape - Schema shape, inferred from `schema`
 * @typeParam TKey - Output keys, inferred from `result`
 */
export interface UnitConfig<TParams extends ParamsMap, TShape extends ZodRawShape, TKey extends string> {
    /** Input descriptors. Mutually exclusive with a non-empty `schema`. */
    params?: TParams;
    /** Zod object whose fields become the input contract */
    schema?: ZodObject<TShape>;
    /** Output keys */
    result?: readonly TKey[];
    /**
     * Gate for the handler. A bare function is named after itself
     * in diagnostics (`'precondition'` when anonymous).
     */
    precondition?:
        | PreconditionFn<DefinedInput<TParams, TShape>>
        | PreconditionDef<DefinedInput<TParams, TShape>>;
    handler: UnitBody<DefinedInput<TParams, TShape>, Record<TKey, unknown>>;
}

/** Input record of a unit declared through {@link defineUnit} */
export type DefinedInput<TParams extends ParamsMap, TShape extends ZodRawShape> =
    InferParams<TParams> & z.input<ZodObject<TShape>>;

// ============================================================================
// defineUnit()
// ============================================================================

/**
 * Define a unit from a config object.
 *
 * @throws {DualParameterDefinitionError} When both a non-empty `params`
 *   map and a `schema` are given
 */
export function defineUnit<
    TParams extends ParamsMap = Record<never, never>,
    TShape extends ZodRawShape = Record<never, never>,
    TKey extends string = never,
>(
    name: string,
    config: UnitConfig<TParams, TShape, TKey>,
): Unit<DefinedInput<TParams, TShape>, Record<TKey, unknown>> {
    const { params, schema, result, precondition, handler } = config;

    if (schema && params && Object.keys(params).length > 0) {
        throw new DualParameterDefinitionError(name);
    }

    const paramsMap: ParamsMap = schema ? deriveParamsFromSchema(schema) : params ?? {};

    return new Unit<DefinedInput<TParams, TShape>, Record<TKey, unknown>>({
        name,
        params: compileParams(name, paramsMap),
        outputs: compileOutputs(name, result ?? []),
        precondition: typeof precondition === 'function'
            ? { name: precondition.name || 'precondition', check: precondition }
            : precondition,
        body: handler,
    });
}
