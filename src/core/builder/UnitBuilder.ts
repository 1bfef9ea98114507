/**
 * UnitBuilder — Type-Chaining Builder for Unit Contracts
 *
 * The explicit contract API behind `unit(name)`. Each declaration widens
 * the builder's input or output type, so the body passed to `.handle()`
 * sees a fully typed `ctx.input` and a `ctx.set()` that only accepts
 * declared outputs.
 *
 * Declarations are additive: calling `params()` or `result()` again adds
 * keys (a key declared twice keeps its first position; the latest
 * descriptor wins). `.handle()` seals the definition, and any declaration
 * made through the builder afterwards throws {@link DefinitionOrderError}.
 *
 * @example
 * ```typescript
 * const debit = unit('debit')
 *     .params({ account: z.string(), amount: z.number().positive() })
 *     .optionalParams('memo')
 *     .result('balance')
 *     .precondition('isOpen', ({ input }) => ledger.isOpen(input.account))
 *     .handle(async (ctx) => {
 *         const balance = await ledger.balance(ctx.input.account);
 *         if (balance < ctx.input.amount) return ctx.die('Insufficient funds');
 *         return { balance: await ledger.debit(ctx.input.account, ctx.input.amount) };
 *     });
 * ```
 *
 * @see {@link defineUnit} for the config-object shorthand
 *
 * @module
 */
import { DefinitionOrderError } from '../errors.js';
import { Unit } from '../Unit.js';
import { type PreconditionContext, type PreconditionDef, type UnitBody } from '../execution/UnitExecution.js';
import {
    compileOutputs,
    compileParams,
    mergeCompiled,
    type CompiledOutput,
    type CompiledParam,
    type InferParams,
    type InferResult,
    type ParamsMap,
    type ResultShape,
} from './ParamDescriptors.js';

// ── Draft ────────────────────────────────────────────────

/**
 * The definition under construction, shared by every builder view
 * returned along one chain.
 * @internal
 */
interface UnitDraft {
    readonly name: string;
    params: CompiledParam[] | undefined;
    outputs: CompiledOutput[] | undefined;
    precondition: PreconditionDef<object> | undefined;
    sealed: boolean;
}

// ── Builder ──────────────────────────────────────────────

export class UnitBuilder<
    TIn extends object = Record<never, never>,
    TOut extends object = Record<never, never>,
> {
    /** @internal */
    private constructor(private readonly _draft: UnitDraft) {}

    /** @internal */
    static start(name: string): UnitBuilder {
        return new UnitBuilder({
            name,
            params: undefined,
            outputs: undefined,
            precondition: undefined,
            sealed: false,
        });
    }

    // ── Input Contract ───────────────────────────────────

    /**
     * Declare input keys.
     *
     * @param map - Key → `'required'`, `'optional'` or a Zod schema
     */
    params<M extends ParamsMap>(map: M): UnitBuilder<TIn & InferParams<M>, TOut> {
        const draft = this._open('params');
        draft.params = mergeCompiled(draft.params ?? [], compileParams(draft.name, map));
        return new UnitBuilder<TIn & InferParams<M>, TOut>(draft);
    }

    /** Declare optional input keys with no value validation. */
    optionalParams<K extends string>(...keys: K[]): UnitBuilder<TIn & Partial<Record<K, unknown>>, TOut> {
        const draft = this._open('optionalParams');
        const map: ParamsMap = {};
        for (const key of keys) map[key] = 'optional';
        draft.params = mergeCompiled(draft.params ?? [], compileParams(draft.name, map));
        return new UnitBuilder<TIn & Partial<Record<K, unknown>>, TOut>(draft);
    }

    /** Declare that the unit takes no inputs. Clears earlier input declarations. */
    noParams(): UnitBuilder<Record<never, never>, TOut> {
        const draft = this._open('noParams');
        draft.params = [];
        return new UnitBuilder<Record<never, never>, TOut>(draft);
    }

    // ── Output Contract ──────────────────────────────────

    /** Declare output keys. Every declared output must be set on success. */
    result<K extends string>(...keys: K[]): UnitBuilder<TIn, TOut & Record<K, unknown>> {
        const draft = this._open('result');
        draft.outputs = mergeCompiled(draft.outputs ?? [], compileOutputs(draft.name, keys));
        return new UnitBuilder<TIn, TOut & Record<K, unknown>>(draft);
    }

    /**
     * Declare output keys with a Zod schema per key.
     * Values set by the body are checked against their schema.
     */
    returns<S extends ResultShape>(shape: S): UnitBuilder<TIn, TOut & InferResult<S>> {
        const draft = this._open('returns');
        draft.outputs = mergeCompiled(draft.outputs ?? [], compileOutputs(draft.name, shape));
        return new UnitBuilder<TIn, TOut & InferResult<S>>(draft);
    }

    /** Declare that the unit produces no outputs. Clears earlier output declarations. */
    noResult(): UnitBuilder<TIn, Record<never, never>> {
        const draft = this._open('noResult');
        draft.outputs = [];
        return new UnitBuilder<TIn, Record<never, never>>(draft);
    }

    // ── Gate ─────────────────────────────────────────────

    /**
     * Gate the body behind a predicate. A falsy result skips the body and
     * yields a successful Outcome marked `skipped`.
     *
     * @param name - Shown in diagnostics
     * @param check - May be async; may call `addMessage`
     */
    precondition(name: string, check: (ctx: PreconditionContext<TIn>) => unknown): UnitBuilder<TIn, TOut> {
        const draft = this._open('precondition');
        const def: PreconditionDef<TIn> = { name, check };
        draft.precondition = def;
        return this;
    }

    // ── Terminal: handle() ───────────────────────────────

    /**
     * Attach the body and seal the definition.
     *
     * A unit whose inputs or outputs were never declared is still built,
     * but invoking it throws `ImplicitConfigurationError`.
     */
    handle(body: UnitBody<TIn, TOut>): Unit<TIn, TOut> {
        const draft = this._open('handle');
        draft.sealed = true;
        return new Unit<TIn, TOut>({
            name: draft.name,
            params: draft.params,
            outputs: draft.outputs,
            precondition: draft.precondition,
            body,
        });
    }

    private _open(declaration: string): UnitDraft {
        if (this._draft.sealed) throw new DefinitionOrderError(this._draft.name, declaration);
        return this._draft;
    }
}

/**
 * Start declaring a unit.
 *
 * @param name - Unit name, used in diagnostics and error messages
 */
export function unit(name: string): UnitBuilder {
    return UnitBuilder.start(name);
}
