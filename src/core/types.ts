/**
 * Contracts & Shared Types
 *
 * Single-file type definitions following the consolidated contracts pattern.
 * Outcome shapes, the invocable contract every composer registration
 * satisfies, and the reserved outcome keys live here.
 *
 * @module
 */
import { type DiagnosticSink } from '../observability/Diagnostics.js';

// ── Utility Types ────────────────────────────────────────

/** A value that may be returned synchronously or through a promise */
export type MaybePromise<T> = T | Promise<T>;

// ── Reserved Keys ────────────────────────────────────────

/** Outcome keys owned by the framework */
export const RESERVED_KEYS: readonly string[] = Object.freeze(['successful', 'messages']);

/** Whether `key` is one of {@link RESERVED_KEYS} */
export function isReservedKey(key: string): boolean {
    return RESERVED_KEYS.includes(key);
}

// ── Outcome ──────────────────────────────────────────────

/**
 * The keys every Outcome carries.
 *
 * `skipped` is only present on outcomes of units whose precondition
 * (or per-registration precondition) evaluated falsy.
 */
export type OutcomeBase = {
    successful: boolean;
    messages: string[];
    skipped?: boolean;
};

/**
 * Result of invoking a unit: reserved keys plus the declared outputs.
 *
 * Outputs are optional in the type because a failed outcome may lack them.
 *
 * @typeParam TOut - Declared output record
 */
export type Outcome<TOut extends object = Record<never, never>> = OutcomeBase & Partial<TOut>;

/** Result of an accumulating composer: inputs, merged outputs and reserved keys */
export type AccumulatedOutcome = OutcomeBase & Record<string, unknown>;

// ── Invocation ───────────────────────────────────────────

/**
 * What a unit accepts when invoked.
 *
 * Declared keys keep their types but are optional: a missing required
 * key is a domain failure reported in the Outcome, not a compile error.
 * Extra keys pass through (composers hand their whole accumulator over).
 */
export type UnitInput<TIn extends object> = Partial<TIn> & Record<string, unknown>;

/** Per-call options */
export interface CallOptions {
    /** Sink for this call's diagnostics. Defaults to the process-wide sink. */
    readonly sink?: DiagnosticSink;
}

/**
 * Anything an isolated composer can register: a unit, a composer, or a
 * hand-written object with the same two entry points.
 *
 * Declared with method syntax so that units with narrower input types
 * remain assignable to the default instantiation.
 */
export interface Invocable<
    TIn extends object = Record<never, never>,
    TOut extends object = Record<never, never>,
> {
    readonly name: string;
    /** Lenient entry point: never rejects for a domain failure */
    call(input: UnitInput<TIn>, options?: CallOptions): Promise<Outcome<TOut>>;
    /** Strict entry point: rejects with `FailureError` when unsuccessful */
    callStrict(input: UnitInput<TIn>, options?: CallOptions): Promise<Outcome<TOut>>;
}

// ── Contract ─────────────────────────────────────────────

/** A sealed unit contract, as reported by `describeContract()` */
export interface UnitContract {
    readonly name: string;
    /** Declared input keys, in declaration order */
    readonly inputs: readonly string[];
    /** The required subset of `inputs`, in declaration order */
    readonly requiredInputs: readonly string[];
    /** Declared output keys, in declaration order; all are required */
    readonly outputs: readonly string[];
    /** Precondition name, when one is declared */
    readonly precondition: string | undefined;
}

/**
 * An invocable that can report its contract.
 * Accumulating composers only register these, for the feasibility pass.
 */
export interface ContractedInvocable<
    TIn extends object = Record<never, never>,
    TOut extends object = Record<never, never>,
> extends Invocable<TIn, TOut> {
    /** @throws {ImplicitConfigurationError} When the contract was never declared */
    describeContract(): UnitContract;
}
