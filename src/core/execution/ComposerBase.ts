/**
 * ComposerBase — Registration, Wrapping Scope and Failure Callback
 *
 * Shared machinery of both composers:
 *
 * - an ordered, append-only registration list;
 * - a wrapping scope, settable once, that runs around each top-level
 *   call and must invoke its continuation exactly once;
 * - an optional failure callback;
 * - an optional name and diagnostic sink.
 *
 * @example
 * ```typescript
 * composer.around(async (proceed) => {
 *     await db.transaction(async () => {
 *         await proceed();
 *     });
 * });
 * ```
 *
 * @module
 */
import { type DiagnosticSink, getDiagnosticSink } from '../../observability/Diagnostics.js';
import { ComposerConfigurationError } from '../errors.js';
import { type CallOptions, type MaybePromise, type OutcomeBase } from '../types.js';

// ── Types ────────────────────────────────────────────────

/**
 * Wraps the execution of a whole composition.
 *
 * `proceed` runs every registration; it must be invoked exactly once.
 * A scope that never invokes it drops the execution, and the composer
 * returns whatever was collected (nothing).
 */
export type WrappingScope = (proceed: () => Promise<void>) => MaybePromise<void>;

/** Invoked with the Outcome of a unit that failed during a lenient call */
export type FailureCallback = (outcome: OutcomeBase) => MaybePromise<void>;

/** Composer factory options */
export interface ComposerOptions {
    /** Shown in diagnostics and error messages */
    readonly name?: string;
    /** Sink for this composer's diagnostics. Per-call sinks take precedence. */
    readonly sink?: DiagnosticSink;
}

// ── Base ─────────────────────────────────────────────────

export abstract class ComposerBase<TRegistration> {
    public readonly name: string;
    protected readonly _registrations: TRegistration[] = [];
    private readonly _sink: DiagnosticSink | undefined;
    private _scope: WrappingScope | undefined;
    private _onFailure: FailureCallback | undefined;

    protected constructor(defaultName: string, options: ComposerOptions) {
        this.name = options.name ?? defaultName;
        this._sink = options.sink;
    }

    /** Number of registrations */
    get size(): number {
        return this._registrations.length;
    }

    /**
     * Set the wrapping scope.
     *
     * @throws {ComposerConfigurationError} When a scope is already set
     */
    around(scope: WrappingScope): this {
        if (this._scope) {
            throw new ComposerConfigurationError(this.name, 'around() may only be configured once');
        }
        this._scope = scope;
        return this;
    }

    /**
     * Set the failure callback. Errors it throws propagate out of the
     * call, through the wrapping scope.
     */
    onFailure(callback: FailureCallback): this {
        this._onFailure = callback;
        return this;
    }

    // ── Protected ────────────────────────────────────────

    /** Per-call sink, then this composer's sink, then the process-wide sink */
    protected _resolveSink(options: CallOptions): DiagnosticSink {
        return options.sink ?? this._sink ?? getDiagnosticSink();
    }

    /** Run `run` inside the wrapping scope (or directly when none is set) */
    protected async _withinScope(run: () => Promise<void>): Promise<void> {
        const scope = this._scope;
        if (!scope) {
            await run();
            return;
        }

        let proceeded = false;
        await scope(async () => {
            if (proceeded) {
                throw new ComposerConfigurationError(this.name, 'the around() continuation was invoked more than once');
            }
            proceeded = true;
            await run();
        });
    }

    protected async _notifyFailure(outcome: OutcomeBase): Promise<void> {
        if (this._onFailure) await this._onFailure(outcome);
    }
}
