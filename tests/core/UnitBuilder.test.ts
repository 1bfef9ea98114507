import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { unit, UnitBuilder } from '../../src/core/builder/UnitBuilder.js';
import { Unit } from '../../src/core/Unit.js';
import { DefinitionOrderError, InvalidContractError } from '../../src/core/errors.js';
import { nullSink } from '../../src/observability/Diagnostics.js';

// ============================================================================
// Declarations
// ============================================================================

describe('unit() — declarations', () => {
    it('should return a builder, and a Unit once the body is attached', () => {
        const builder = unit('u');
        expect(builder).toBeInstanceOf(UnitBuilder);
        expect(builder.noParams().noResult().handle(() => {})).toBeInstanceOf(Unit);
    });

    it('should accumulate repeated params() and result() calls', () => {
        const u = unit('additive')
            .params({ a: 'required' })
            .params({ b: 'optional' })
            .result('x')
            .result('y')
            .handle(() => ({ x: 1, y: 2 }));

        expect(u.describeContract()).toEqual({
            name: 'additive',
            inputs: ['a', 'b'],
            requiredInputs: ['a'],
            outputs: ['x', 'y'],
            precondition: undefined,
        });
    });

    it('should keep the position of a key declared twice and take its latest requirement', () => {
        const u = unit('redeclared')
            .params({ a: 'required', b: 'required' })
            .params({ a: 'optional' })
            .noResult()
            .handle(() => {});

        const contract = u.describeContract();
        expect(contract.inputs).toEqual(['a', 'b']);
        expect(contract.requiredInputs).toEqual(['b']);
    });

    it('should declare optional keys through optionalParams()', () => {
        const u = unit('opt')
            .params({ id: 'required' })
            .optionalParams('memo', 'tag')
            .noResult()
            .handle(() => {});

        const contract = u.describeContract();
        expect(contract.inputs).toEqual(['id', 'memo', 'tag']);
        expect(contract.requiredInputs).toEqual(['id']);
    });

    it('should take optionality from a zod descriptor', () => {
        const u = unit('zod')
            .params({ amount: z.number(), memo: z.string().optional(), note: z.string().nullish() })
            .noResult()
            .handle(() => {});

        expect(u.describeContract().requiredInputs).toEqual(['amount']);
    });

    it('should clear earlier input declarations with noParams()', () => {
        const u = unit('cleared').params({ a: 'required' }).noParams().noResult().handle(() => {});

        expect(u.describeContract().inputs).toEqual([]);
    });

    it('should clear earlier output declarations with noResult()', () => {
        const u = unit('cleared').noParams().result('x').noResult().handle(() => {});

        expect(u.describeContract().outputs).toEqual([]);
    });

    it('should accept a precondition declared before the contract', async () => {
        const u = unit('early')
            .precondition('never', () => false)
            .params({ a: 'required' })
            .noResult()
            .handle(() => {});

        expect(u.describeContract().precondition).toBe('never');
        expect(await u.call({ a: 1 }, { sink: nullSink })).toEqual({ successful: true, skipped: true, messages: [] });
    });

    it('should keep the latest precondition', () => {
        const u = unit('twice')
            .noParams()
            .noResult()
            .precondition('first', () => true)
            .precondition('second', () => true)
            .handle(() => {});

        expect(u.describeContract().precondition).toBe('second');
    });
});

// ============================================================================
// Invalid declarations
// ============================================================================

describe('unit() — invalid declarations', () => {
    it('should reject a reserved input key', () => {
        expect(() => unit('r').params({ messages: 'optional' })).toThrow(InvalidContractError);
        expect(() => unit('r').params({ messages: 'optional' })).toThrow(
            'Unit "r": "messages" is reserved and cannot be declared as a parameter',
        );
    });

    it('should reject a reserved output key', () => {
        expect(() => unit('r').result('successful')).toThrow(
            'Unit "r": "successful" is reserved and cannot be declared as a result',
        );
    });

    it('should reject an empty key', () => {
        expect(() => unit('e').optionalParams('')).toThrow('Unit "e": parameter keys must be non-empty strings, got ""');
        expect(() => unit('e').result('')).toThrow('Unit "e": result keys must be non-empty strings, got ""');
    });
});

// ============================================================================
// Sealing
// ============================================================================

describe('unit() — sealing', () => {
    it('should reject a precondition declared after handle()', () => {
        const builder = unit('sealed').noParams().noResult();
        builder.handle(() => {});

        expect(() => builder.precondition('late', () => true)).toThrow(DefinitionOrderError);
        expect(() => builder.precondition('late', () => true)).toThrow(
            'Unit "sealed": precondition() was called after handle(). The definition is sealed once the body is attached.',
        );
    });

    it('should reject any declaration after handle(), through every view of the chain', () => {
        const start = unit('sealed');
        const withParams = start.params({ a: 'required' });
        withParams.noResult().handle(() => {});

        expect(() => start.params({ b: 'optional' })).toThrow(DefinitionOrderError);
        expect(() => withParams.result('x')).toThrow(DefinitionOrderError);
        expect(() => withParams.noParams()).toThrow(DefinitionOrderError);
        expect(() => withParams.handle(() => {})).toThrow(DefinitionOrderError);
    });

    it('should name the offending declaration on the error', () => {
        const builder = unit('sealed').noParams().noResult();
        builder.handle(() => {});

        const error = (() => {
            try {
                builder.returns({ total: z.number() });
                return undefined;
            } catch (e) {
                return e;
            }
        })();

        expect(error).toBeInstanceOf(DefinitionOrderError);
        if (!(error instanceof DefinitionOrderError)) return;
        expect(error.unitName).toBe('sealed');
        expect(error.declaration).toBe('returns');
    });
});
