import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { defineUnit } from '../../src/core/builder/defineUnit.js';
import { unit } from '../../src/core/builder/UnitBuilder.js';
import { DualParameterDefinitionError } from '../../src/core/errors.js';
import { nullSink } from '../../src/observability/Diagnostics.js';

describe('defineUnit() — contract', () => {
    it('should produce the same contract as the fluent builder', () => {
        const declared = defineUnit('credit', {
            params: { account: 'required', memo: 'optional' },
            result: ['balance'],
            precondition: { name: 'isOpen', check: () => true },
            handler: () => ({ balance: 1 }),
        });
        const built = unit('credit')
            .params({ account: 'required', memo: 'optional' })
            .result('balance')
            .precondition('isOpen', () => true)
            .handle(() => ({ balance: 1 }));

        expect(declared.describeContract()).toEqual(built.describeContract());
    });

    it('should derive inputs from a zod object schema', () => {
        const declared = defineUnit('credit', {
            schema: z.object({ account: z.string(), amount: z.number(), memo: z.string().optional() }),
            result: ['balance'],
            handler: ({ input }) => ({ balance: input.amount }),
        });

        expect(declared.describeContract()).toEqual({
            name: 'credit',
            inputs: ['account', 'amount', 'memo'],
            requiredInputs: ['account', 'amount'],
            outputs: ['balance'],
            precondition: undefined,
        });
    });

    it('should declare no inputs and no outputs when both are omitted', () => {
        const declared = defineUnit('bare', { handler: () => {} });

        expect(declared.describeContract()).toEqual({
            name: 'bare',
            inputs: [],
            requiredInputs: [],
            outputs: [],
            precondition: undefined,
        });
    });

    it('should treat an empty result list as no outputs', () => {
        const declared = defineUnit('bare', { result: [], handler: () => {} });

        expect(declared.describeContract().outputs).toEqual([]);
    });

    it('should reject params and schema declared together', () => {
        const define = () => defineUnit('dual', {
            params: { a: 'required' },
            schema: z.object({ b: z.string() }),
            handler: () => {},
        });

        expect(define).toThrow(DualParameterDefinitionError);
        expect(define).toThrow(
            'defineUnit("dual") declares input keys both via params: { ... } and schema. Only one form is allowed.',
        );
    });

    it('should allow an empty params map next to a schema', () => {
        const declared = defineUnit('mixed', {
            params: {},
            schema: z.object({ b: z.string() }),
            handler: () => {},
        });

        expect(declared.describeContract().inputs).toEqual(['b']);
    });

    it('should name a bare precondition function after itself', () => {
        function hasFunds(): boolean {
            return true;
        }
        const named = defineUnit('named', { precondition: hasFunds, handler: () => {} });
        const inline = defineUnit('inline', { precondition: () => true, handler: () => {} });

        expect(named.describeContract().precondition).toBe('hasFunds');
        expect(inline.describeContract().precondition).toBe('precondition');
    });
});

describe('defineUnit() — invocation', () => {
    const credit = defineUnit('credit', {
        schema: z.object({ account: z.string(), amount: z.number().positive() }),
        result: ['balance'],
        handler: ({ input }) => ({ balance: 100 + input.amount }),
    });

    it('should run the handler with the bound input', async () => {
        const outcome = await credit.call({ account: 'a-1', amount: 5 }, { sink: nullSink });

        expect(outcome).toEqual({ balance: 105, successful: true, messages: [] });
    });

    it('should validate inputs with the schema fields', async () => {
        const missing = await credit.call({ account: 'a-1' }, { sink: nullSink });
        const invalid = await credit.call({ account: 'a-1', amount: 0 }, { sink: nullSink });

        expect(missing).toEqual({ successful: false, messages: ['"amount" is required'] });
        expect(invalid).toEqual({ successful: false, messages: ['"amount" is invalid: Number must be greater than 0'] });
    });

    it('should gate the handler with the precondition', async () => {
        const handler = vi.fn();
        const gated = defineUnit('gated', {
            params: { open: 'required' },
            precondition: ({ input }) => input.open === true,
            handler,
        });

        const closed = await gated.call({ open: false }, { sink: nullSink });
        const open = await gated.call({ open: true }, { sink: nullSink });

        expect(closed).toEqual({ successful: true, skipped: true, messages: [] });
        expect(open).toEqual({ successful: true, messages: [] });
        expect(handler).toHaveBeenCalledOnce();
    });
});
