/** Core Bounded Context — Barrel Export */
export { Unit } from './Unit.js';
export type { UnitDefinition } from './Unit.js';
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
} from './errors.js';
export { RESERVED_KEYS, isReservedKey } from './types.js';
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
} from './types.js';
export * from './builder/index.js';
export * from './execution/index.js';
