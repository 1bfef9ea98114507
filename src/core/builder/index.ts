/** Builder Bounded Context — Barrel Export */
export { UnitBuilder, unit } from './UnitBuilder.js';
export { defineUnit } from './defineUnit.js';
export type { UnitConfig, DefinedInput } from './defineUnit.js';
export { isZodSchema } from './ParamDescriptors.js';
export type {
    Requirement,
    ParamDef,
    ParamsMap,
    ResultShape,
    InferParams,
    InferResult,
} from './ParamDescriptors.js';
