/**
 * UnitExecution — The Invocation Protocol for a Single Unit
 *
 * One execution instance per call. It binds the inputs, seeds the
 * outcome with `{ successful: true, messages: [] }` and walks the
 * protocol:
 *
 *   validate inputs → precondition → body → validate outputs → outcome
 *
 * Aborting (`ctx.die()`) is an early return of a halt token from the
 * body. Nothing is thrown, so an abort can never be observed outside
 * the invocation. Exceptions thrown by a body or precondition are not
 * domain failures and propagate unchanged.
 *
 * @module
 */
import { type DiagnosticSink, previewInputs, renderValue } from '../../observability/Diagnostics.js';
import { formatIssues, type CompiledOutput, type CompiledParam } from '../builder/ParamDescriptors.js';
import {
    type AccumulatedOutcome,
    type MaybePromise,
    type Outcome,
    type UnitInput,
} from '../types.js';
import { type AccumulatingComposer } from './AccumulatingComposer.js';
import { runSubComposition, selectForCaller } from './SubComposition.js';

// ── Halt Token ───────────────────────────────────────────

/**
 * Returned by `ctx.die()`. A body returns it to stop early:
 *
 * ```typescript
 * if (balance < amount) return ctx.die('Insufficient funds');
 * ```
 */
export interface Halt {
    readonly __brand: 'UnitHalt';
}

const HALT: Halt = Object.freeze({ __brand: 'UnitHalt' });

/** @internal */
function isHalt(value: unknown): value is Halt {
    return (
        typeof value === 'object' &&
        value !== null &&
        '__brand' in value &&
        value.__brand === 'UnitHalt'
    );
}

// ── Contexts ─────────────────────────────────────────────

/** What a precondition sees */
export interface PreconditionContext<TIn extends object> {
    /** Bound inputs; every required key is present */
    readonly input: Readonly<TIn>;
    /** Append one or more messages to the outcome */
    addMessage(message: string | readonly string[]): void;
}

/** What a unit body sees */
export interface UnitContext<TIn extends object, TOut extends object> extends PreconditionContext<TIn> {
    readonly unitName: string;
    /** Current value of the outcome's `successful` flag */
    readonly successful: boolean;
    /** Messages recorded so far */
    readonly messages: readonly string[];
    /** Record a declared output */
    set<K extends keyof TOut & string>(key: K, value: TOut[K]): void;
    /**
     * Mark the invocation failed, append messages, and return the halt token.
     * Return it from the body to stop: `return ctx.die('…')`.
     */
    die(message?: string | readonly string[]): Halt;
    /**
     * Run an ad hoc accumulating composer and fold its result into this unit.
     *
     * Only this unit's declared outputs and `successful` are taken from the
     * sub-result (keys whose value is `undefined` or `null` are dropped);
     * its messages are always appended to this unit's messages.
     *
     * @returns The full sub-result
     */
    compose(
        inputs: Record<string, unknown>,
        configure: (composer: AccumulatingComposer) => void,
    ): Promise<AccumulatedOutcome>;
}

/**
 * A unit body: may return outputs, the halt token, or nothing. A returned
 * object is merged like `ctx.set` calls, so another unit's Outcome can be
 * handed back as is.
 */
export type UnitBody<TIn extends object, TOut extends object> =
    (ctx: UnitContext<TIn, TOut>) => MaybePromise<Partial<TOut> | Halt | void>;

/**
 * A named precondition. Falsy results skip the body without failing.
 *
 * `check` is declared with method syntax: a precondition written against
 * the inputs declared so far stays valid as more inputs are declared.
 */
export interface PreconditionDef<TIn extends object> {
    readonly name: string;
    check(ctx: PreconditionContext<TIn>): unknown;
}

// ── Sealed Definition ────────────────────────────────────

/** A unit definition whose both contract sides are declared */
export interface SealedDefinition<TIn extends object, TOut extends object> {
    readonly name: string;
    readonly params: readonly CompiledParam[];
    readonly outputs: readonly CompiledOutput[];
    readonly precondition: PreconditionDef<TIn> | undefined;
    readonly body: UnitBody<TIn, TOut>;
}

// ── Execution ────────────────────────────────────────────

/** Messages carried by a `messages` value a body set or returned */
function toMessages(value: unknown): string[] {
    if (value === undefined || value === null) return [];
    const entries: readonly unknown[] = Array.isArray(value) ? value : [value];
    return entries.map((entry) => (typeof entry === 'string' ? entry : renderValue(entry)));
}

/** Type guard: every required key is bound */
function hasRequiredInputs<TIn extends object>(
    input: UnitInput<TIn>,
    params: readonly CompiledParam[],
): input is UnitInput<TIn> & TIn {
    return params.every((p) => !p.required || input[p.key] !== undefined);
}

class UnitExecution<TIn extends object, TOut extends object> {
    private _successful = true;
    private readonly _messages: string[] = [];
    private readonly _outputs: Partial<TOut> = {};
    private _skipped = false;

    constructor(
        private readonly _definition: SealedDefinition<TIn, TOut>,
        private readonly _sink: DiagnosticSink,
    ) {}

    async run(input: UnitInput<TIn>): Promise<Outcome<TOut>> {
        const def = this._definition;
        const preview = previewInputs(input);

        // Step 1: inputs, strictly before the precondition
        const violations = this._validateInputs(input);
        if (violations.length > 0 || !hasRequiredInputs(input, def.params)) {
            this._addMessage(violations);
            this._successful = false;
            this._sink.warn(`Unit ${def.name} was aborted with params: ${preview} : ${violations.join('; ')}`);
            return this._finalize();
        }

        // Step 2: precondition
        const precondition = def.precondition;
        if (precondition) {
            const verdict: unknown = await precondition.check({
                input,
                addMessage: (message) => this._addMessage(message),
            });
            const gate = verdict ? 'executed' : 'skipped';
            this._sink.info(
                `Unit ${def.name} was ${gate} with params: ${preview} : ` +
                `precondition "${precondition.name}" evaluated to ${renderValue(verdict)}`,
            );
            if (!verdict) {
                this._skipped = true;
                return this._finalize();
            }
        } else {
            this._sink.info(`Unit ${def.name} was executed with params: ${preview} : no precondition defined`);
        }

        // Step 3: body
        const returned = await def.body(this._context(input));
        if (isHalt(returned)) return this._finalize();
        if (typeof returned === 'object' && returned !== null) {
            for (const [key, value] of Object.entries(returned)) {
                this._setOutput(key, value);
            }
        }

        // Step 4: outputs
        if (this._successful) this._validateOutputs();

        return this._finalize();
    }

    // ── Context ──────────────────────────────────────────

    private _context(input: Readonly<TIn>): UnitContext<TIn, TOut> {
        const execution = this;
        const def = this._definition;
        return {
            input,
            unitName: def.name,
            get successful() { return execution._successful; },
            get messages() { return [...execution._messages]; },
            addMessage: (message) => this._addMessage(message),
            set: (key, value) => this._setOutput(key, value),
            die: (message) => {
                this._successful = false;
                if (message !== undefined) this._addMessage(message);
                return HALT;
            },
            compose: async (inputs, configure) => {
                const sub = await runSubComposition(inputs, configure, { unitName: def.name, sink: this._sink });
                for (const [key, value] of selectForCaller(sub, def.outputs.map((o) => o.key))) {
                    this._setOutput(key, value);
                }
                this._addMessage(sub.messages);
                return sub;
            },
        };
    }

    private _addMessage(message: string | readonly string[]): void {
        if (typeof message === 'string') this._messages.push(message);
        else this._messages.push(...message);
    }

    private _setOutput(key: string, value: unknown): void {
        switch (key) {
            case 'successful':
                this._successful = value === true;
                return;
            case 'messages':
                this._addMessage(toMessages(value));
                return;
            default:
                Reflect.set(this._outputs, key, value);
        }
    }

    // ── Validation ───────────────────────────────────────

    private _validateInputs(input: UnitInput<TIn>): string[] {
        const violations: string[] = [];
        for (const param of this._definition.params) {
            const value = input[param.key];
            if (value === undefined) {
                if (param.required) violations.push(`"${param.key}" is required`);
                continue;
            }
            if (param.schema) {
                const parsed = param.schema.safeParse(value);
                if (!parsed.success) violations.push(`"${param.key}" is invalid: ${formatIssues(parsed.error)}`);
            }
        }
        return violations;
    }

    private _validateOutputs(): void {
        const produced = new Map<string, unknown>(Object.entries(this._outputs));
        const declared = this._definition.outputs;
        const violations: string[] = [];

        for (const output of declared) {
            if (produced.get(output.key) === undefined) {
                violations.push(`Unit implementation did not set required result: "${output.key}"`);
            }
        }
        for (const key of produced.keys()) {
            if (!declared.some((o) => o.key === key)) {
                violations.push(`Unit implementation set undeclared result: "${key}"`);
            }
        }
        for (const output of declared) {
            const value = produced.get(output.key);
            if (!output.schema || value === undefined) continue;
            const parsed = output.schema.safeParse(value);
            if (!parsed.success) {
                violations.push(`Unit implementation set invalid result "${output.key}": ${formatIssues(parsed.error)}`);
            }
        }

        if (violations.length > 0) {
            this._addMessage(violations);
            this._successful = false;
        }
    }

    private _finalize(): Outcome<TOut> {
        const base = { successful: this._successful, messages: [...this._messages] };
        if (this._skipped) {
            const none: Partial<TOut> = {};
            return { ...none, ...base, skipped: true };
        }
        return { ...this._outputs, ...base };
    }
}

/**
 * Run one invocation of a sealed unit definition.
 * @internal
 */
export function executeUnit<TIn extends object, TOut extends object>(
    definition: SealedDefinition<TIn, TOut>,
    input: UnitInput<TIn>,
    sink: DiagnosticSink,
): Promise<Outcome<TOut>> {
    return new UnitExecution(definition, sink).run(input);
}
