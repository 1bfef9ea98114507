/**
 * ParamDescriptors — Contract Descriptors with TypeScript Inference
 *
 * A unit's inputs are declared as a map from key to descriptor. A
 * descriptor is either a requirement string or a Zod schema:
 *
 * @example
 * ```typescript
 * // Requirement shorthand: value type stays `unknown`
 * { account_id: 'required', memo: 'optional' }
 *
 * // Zod schema: value type and optionality inferred from the schema
 * { amount: z.number().positive(), memo: z.string().optional() }
 * ```
 *
 * Outputs are declared as a list of keys, or as a map from key to Zod
 * schema. Every declared output is required.
 *
 * Descriptors are validated when declared and compiled into an ordered
 * list the execution engine reads.
 *
 * @internal
 * @module
 */
import { z, type ZodObject, type ZodRawShape, type ZodTypeAny } from 'zod';
import { InvalidContractError } from '../errors.js';
import { isReservedKey } from '../types.js';

// ============================================================================
// Descriptor Types (user-facing)
// ============================================================================

/** Requirement shorthand */
export type Requirement = 'required' | 'optional';

/** Any valid input descriptor: requirement shorthand or Zod schema */
export type ParamDef = Requirement | ZodTypeAny;

/** Map of input keys to their descriptors */
export type ParamsMap = Record<string, ParamDef>;

/** Map of output keys to the Zod schema their values must satisfy */
export type ResultShape = Record<string, ZodTypeAny>;

// ============================================================================
// Type Inference — compile-time input/output records from descriptors
// ============================================================================

/** Infer the value type of a single descriptor */
type InferSingleParam<T extends ParamDef> =
    T extends ZodTypeAny ? z.input<T> : unknown;

/** Whether a descriptor declares an optional key */
type IsOptional<T extends ParamDef> =
    T extends 'optional' ? true :
    T extends 'required' ? false :
    T extends ZodTypeAny ? (undefined extends z.input<T> ? true : false) :
    false;

/** Required keys from a ParamsMap */
type RequiredKeys<T extends ParamsMap> = {
    [K in keyof T]: IsOptional<T[K]> extends true ? never : K;
}[keyof T];

/** Optional keys from a ParamsMap */
type OptionalKeys<T extends ParamsMap> = {
    [K in keyof T]: IsOptional<T[K]> extends true ? K : never;
}[keyof T];

/**
 * Infer the input record from a ParamsMap.
 *
 * Required descriptors become required properties, optional descriptors
 * optional ones. Values are the Zod *input* type: the engine validates
 * values but binds them unchanged, so defaults and transforms do not apply.
 */
export type InferParams<T extends ParamsMap> =
    { [K in RequiredKeys<T>]: InferSingleParam<T[K]> } &
    { [K in OptionalKeys<T>]?: InferSingleParam<T[K]> };

/** Infer the output record from a ResultShape */
export type InferResult<T extends ResultShape> = { [K in keyof T]: z.output<T[K]> };

// ============================================================================
// Compiled Descriptors (engine-facing)
// ============================================================================

/** A declared input key */
export interface CompiledParam {
    readonly key: string;
    readonly required: boolean;
    readonly schema: ZodTypeAny | undefined;
}

/** A declared output key */
export interface CompiledOutput {
    readonly key: string;
    readonly schema: ZodTypeAny | undefined;
}

// ── Guards ───────────────────────────────────────────────

/**
 * Check if a value is a Zod schema (has `_def` and `safeParse`).
 *
 * Duck-typed so schemas built by another copy of zod are recognized.
 */
export function isZodSchema(value: unknown): value is ZodTypeAny {
    return (
        typeof value === 'object' &&
        value !== null &&
        '_def' in value &&
        typeof value._def === 'object' &&
        'safeParse' in value &&
        typeof value.safeParse === 'function'
    );
}

/** Validates one input descriptor */
const ParamDefSchema = z.union([
    z.literal('required'),
    z.literal('optional'),
    z.custom<ZodTypeAny>(isZodSchema),
]);

/** Validates one output key */
const KeySchema = z.string().min(1);

function assertKey(unitName: string, key: unknown, side: 'parameter' | 'result'): string {
    const parsed = KeySchema.safeParse(key);
    if (!parsed.success) {
        throw new InvalidContractError(unitName, `${side} keys must be non-empty strings, got ${JSON.stringify(key)}`);
    }
    if (isReservedKey(parsed.data)) {
        throw new InvalidContractError(unitName, `"${parsed.data}" is reserved and cannot be declared as a ${side}`);
    }
    return parsed.data;
}

// ── Compilers ────────────────────────────────────────────

/**
 * Compile an input descriptor map.
 *
 * @throws {InvalidContractError} When a key is empty or reserved, or a
 *   descriptor is neither `'required'`, `'optional'` nor a Zod schema
 */
export function compileParams(unitName: string, params: ParamsMap): CompiledParam[] {
    const compiled: CompiledParam[] = [];
    for (const [rawKey, value] of Object.entries(params)) {
        const key = assertKey(unitName, rawKey, 'parameter');
        const parsed = ParamDefSchema.safeParse(value);
        if (!parsed.success) {
            throw new InvalidContractError(
                unitName,
                `Unknown parameter configuration for "${key}": ${JSON.stringify(value)}. ` +
                "Must be one of 'required', 'optional' or a zod schema",
            );
        }
        const def = parsed.data;
        compiled.push(typeof def === 'string'
            ? { key, required: def === 'required', schema: undefined }
            : { key, required: !def.isOptional(), schema: def });
    }
    return compiled;
}

/**
 * Compile output keys, or an output shape.
 *
 * @throws {InvalidContractError} When a key is empty or reserved, or a
 *   shape value is not a Zod schema
 */
export function compileOutputs(unitName: string, outputs: readonly string[] | ResultShape): CompiledOutput[] {
    if (Array.isArray(outputs)) {
        return outputs.map((rawKey) => ({ key: assertKey(unitName, rawKey, 'result'), schema: undefined }));
    }
    const compiled: CompiledOutput[] = [];
    for (const [rawKey, value] of Object.entries(outputs)) {
        const key = assertKey(unitName, rawKey, 'result');
        if (!isZodSchema(value)) {
            throw new InvalidContractError(unitName, `result "${key}" must be described by a zod schema`);
        }
        compiled.push({ key, schema: value });
    }
    return compiled;
}

/**
 * Derive an input descriptor map from a Zod object schema.
 *
 * Each field keeps its own schema, so optional fields become optional keys.
 */
export function deriveParamsFromSchema<T extends ZodRawShape>(schema: ZodObject<T>): ParamsMap {
    return { ...schema.shape };
}

/**
 * Merge newly compiled entries into an ordered list.
 *
 * A key declared again keeps its original position and takes the new descriptor.
 */
export function mergeCompiled<T extends { readonly key: string }>(existing: readonly T[], added: readonly T[]): T[] {
    const merged = [...existing];
    for (const entry of added) {
        const index = merged.findIndex((e) => e.key === entry.key);
        if (index >= 0) merged[index] = entry;
        else merged.push(entry);
    }
    return merged;
}

// ── Validation Messages ──────────────────────────────────

/** Render Zod issues as one line: `path: message; path: message` */
export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
