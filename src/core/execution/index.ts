/** Execution Bounded Context — Barrel Export */
export { executeUnit } from './UnitExecution.js';
export type {
    Halt,
    PreconditionContext,
    PreconditionDef,
    UnitContext,
    UnitBody,
    SealedDefinition,
} from './UnitExecution.js';
export { ComposerBase } from './ComposerBase.js';
export type { ComposerOptions, WrappingScope, FailureCallback } from './ComposerBase.js';
export { IsolatedComposer, createIsolatedComposer } from './IsolatedComposer.js';
export type { RegistrationOptions, RegistrationPrecondition } from './IsolatedComposer.js';
export { AccumulatingComposer, createAccumulatingComposer } from './AccumulatingComposer.js';
