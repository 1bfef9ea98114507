/**
 * IsolatedComposer — Independent Units Against Shared Input
 *
 * Every registration is invoked with the same input; no state is threaded
 * between them and a failure never stops the chain. The result is one
 * Outcome per registration, in registration order.
 *
 * @example
 * ```typescript
 * const notify = createIsolatedComposer((c) => {
 *     c.add(sendEmail);
 *     c.add(sendSms, { precondition: (input) => input.phone !== undefined });
 *     c.onFailure((outcome) => alerts.push(outcome.messages));
 * });
 *
 * const [email, sms] = await notify.call({ user_id: 'u-1', phone: '555-0100' });
 * ```
 *
 * @module
 */
import { previewInputs, renderValue } from '../../observability/Diagnostics.js';
import { type CallOptions, type Invocable, type MaybePromise, type Outcome } from '../types.js';
import { ComposerBase, type ComposerOptions } from './ComposerBase.js';

// ── Types ────────────────────────────────────────────────

/** Per-registration gate, evaluated against the composer's input. May be async. */
export type RegistrationPrecondition = (input: Readonly<Record<string, unknown>>) => MaybePromise<unknown>;

/** Options for {@link IsolatedComposer.add} */
export interface RegistrationOptions {
    /** Defaults to always-true */
    readonly precondition?: RegistrationPrecondition;
}

interface IsolatedRegistration {
    readonly invocable: Invocable;
    readonly precondition: RegistrationPrecondition | undefined;
}

// ── Composer ─────────────────────────────────────────────

export class IsolatedComposer extends ComposerBase<IsolatedRegistration> {
    constructor(options: ComposerOptions = {}) {
        super('isolated', options);
    }

    /** Append a registration */
    add(invocable: Invocable, options: RegistrationOptions = {}): this {
        this._registrations.push({ invocable, precondition: options.precondition });
        return this;
    }

    /**
     * Invoke every registration. Unsuccessful outcomes are reported to the
     * sink and the failure callback; the chain continues.
     */
    async call(input: Record<string, unknown> = {}, options: CallOptions = {}): Promise<Outcome[]> {
        return this._run(input, options, false);
    }

    /**
     * Invoke every registration through its strict entry point. The first
     * failure rejects with `FailureError` and the remaining registrations
     * are not invoked.
     */
    async callStrict(input: Record<string, unknown> = {}, options: CallOptions = {}): Promise<Outcome[]> {
        return this._run(input, options, true);
    }

    private async _run(input: Record<string, unknown>, options: CallOptions, strict: boolean): Promise<Outcome[]> {
        const sink = this._resolveSink(options);
        const outcomes: Outcome[] = [];

        await this._withinScope(async () => {
            for (const { invocable, precondition } of this._registrations) {
                if (precondition) {
                    const verdict: unknown = await precondition(input);
                    if (!verdict) {
                        sink.info(
                            `Unit ${invocable.name} was skipped by a composer precondition with params: ` +
                            `${previewInputs(input)} : precondition evaluated to ${renderValue(verdict)}`,
                        );
                        outcomes.push({ successful: true, skipped: true, messages: [] });
                        continue;
                    }
                }

                if (strict) {
                    outcomes.push(await invocable.callStrict(input, { sink }));
                    continue;
                }

                const outcome = await invocable.call(input, { sink });
                outcomes.push(outcome);
                if (!outcome.successful) {
                    sink.warn(
                        `Unit ${invocable.name} failed within composer "${this.name}". ` +
                        `Messages: ${renderValue(outcome.messages)}`,
                    );
                    await this._notifyFailure(outcome);
                }
            }
        });

        return outcomes;
    }
}

/**
 * Create an isolated composer.
 *
 * @param configure - Registers units, and optionally sets `around`/`onFailure`
 */
export function createIsolatedComposer(
    configure?: (composer: IsolatedComposer) => void,
    options: ComposerOptions = {},
): IsolatedComposer {
    const composer = new IsolatedComposer(options);
    configure?.(composer);
    return composer;
}
