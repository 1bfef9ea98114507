/**
 * @module
 * @description
 * Units: atomic, contract-declared pieces of work.
 */
// ── Units ────────────────────────────────────────────────
/** @category Units */
export { Unit, unit, UnitBuilder, defineUnit, isZodSchema } from './core/index.js';
/** @category Units */
export type {
    UnitDefinition,
    UnitConfig,
    DefinedInput,
    UnitContext,
    UnitBody,
    PreconditionContext,
    PreconditionDef,
    Halt,
    Requirement,
    ParamDef,
    ParamsMap,
    ResultShape,
    InferParams,
    InferResult,
} from './core/index.js';

/**
 * @module
 * @description
 * Composers: isolated and accumulating chains of units.
 */
// ── Composers ────────────────────────────────────────────
/** @category Composers */
export {
    ComposerBase,
    IsolatedComposer,
    createIsolatedComposer,
    AccumulatingComposer,
    createAccumulatingComposer,
} from './core/index.js';
/** @category Composers */
export type {
    ComposerOptions,
    WrappingScope,
    FailureCallback,
    RegistrationOptions,
    RegistrationPrecondition,
} from './core/index.js';

/**
 * @module
 * @description
 * Outcome shapes and the invocable contract.
 */
// ── Contracts ────────────────────────────────────────────
/** @category Contracts */
export { RESERVED_KEYS, isReservedKey } from './core/index.js';
/** @category Contracts */
export type {
    MaybePromise,
    OutcomeBase,
    Outcome,
    AccumulatedOutcome,
    UnitInput,
    CallOptions,
    Invocable,
    UnitContract,
    ContractedInvocable,
} from './core/index.js';

/**
 * @module
 * @description
 * Configuration errors and the strict-call failure.
 */
// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    UnitflowError,
    ConfigurationError,
    ImplicitConfigurationError,
    DualParameterDefinitionError,
    DefinitionOrderError,
    InvalidContractError,
    ReservedParameterError,
    UnproducedParameterError,
    ComposerConfigurationError,
    FailureError,
} from './core/index.js';

/**
 * @module
 * @description
 * Diagnostic sink: process-wide, swappable, injectable per call.
 */
// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    createConsoleSink,
    nullSink,
    getDiagnosticSink,
    setDiagnosticSink,
    withDiagnosticSink,
    silence,
    previewInputs,
    renderValue,
} from './observability/index.js';
/** @category Observability */
export type { DiagnosticSink } from './observability/index.js';
