/**
 * Errors — Configuration Errors and Strict-Call Failures
 *
 * Domain failures are never thrown: they travel as Outcome data
 * (`successful: false` + `messages`). The classes here cover the other
 * tier: mistakes in how units and composers are declared or wired,
 * raised once at the point where they are detected. {@link FailureError}
 * is what `callStrict()` throws in place of an unsuccessful Outcome.
 *
 * @module
 */
import { type OutcomeBase } from './types.js';

/** Base class for every error raised by unitflow. */
export class UnitflowError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UnitflowError';
    }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/** A unit or composer was declared or wired incorrectly. */
export class ConfigurationError extends UnitflowError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** A unit was invoked before both sides of its contract were declared. */
export class ImplicitConfigurationError extends ConfigurationError {
    readonly unitName: string;

    constructor(unitName: string) {
        super(
            `Unit "${unitName}": params and result must be explicitly configured. ` +
            'Call params(...) or noParams(), and result(...) or noResult().',
        );
        this.name = 'ImplicitConfigurationError';
        this.unitName = unitName;
    }
}

/** `defineUnit()` received both an explicit `params` map and a `schema`. */
export class DualParameterDefinitionError extends ConfigurationError {
    readonly unitName: string;

    constructor(unitName: string) {
        super(
            `defineUnit("${unitName}") declares input keys both via params: { ... } and schema. ` +
            'Only one form is allowed.',
        );
        this.name = 'DualParameterDefinitionError';
        this.unitName = unitName;
    }
}

/** A declaration arrived after the unit body was attached. */
export class DefinitionOrderError extends ConfigurationError {
    readonly unitName: string;
    readonly declaration: string;

    constructor(unitName: string, declaration: string) {
        super(
            `Unit "${unitName}": ${declaration}() was called after handle(). ` +
            'The definition is sealed once the body is attached.',
        );
        this.name = 'DefinitionOrderError';
        this.unitName = unitName;
        this.declaration = declaration;
    }
}

/** A contract declaration is malformed (unknown descriptor, empty key). */
export class InvalidContractError extends ConfigurationError {
    readonly unitName: string;

    constructor(unitName: string, detail: string) {
        super(`Unit "${unitName}": ${detail}`);
        this.name = 'InvalidContractError';
        this.unitName = unitName;
    }
}

/** Input to an accumulating composer, or a unit's output, used a reserved key. */
export class ReservedParameterError extends ConfigurationError {
    readonly key: string;

    constructor(key: string) {
        super(`incoming parameter not allowed: ${key}`);
        this.name = 'ReservedParameterError';
        this.key = key;
    }
}

/**
 * A unit in an accumulating composer requires inputs that neither the
 * initial inputs nor any preceding unit produce.
 */
export class UnproducedParameterError extends ConfigurationError {
    readonly unitName: string;
    readonly composerName: string;
    readonly initialKeys: readonly string[];
    readonly availableKeys: readonly string[];
    readonly unproducedKeys: readonly string[];

    constructor(details: {
        unitName: string;
        composerName: string;
        initialKeys: readonly string[];
        availableKeys: readonly string[];
        unproducedKeys: readonly string[];
    }) {
        super(
            `Unit "${details.unitName}" included in composer "${details.composerName}" requires parameters ` +
            'that are never produced by a preceding unit. ' +
            `Unproduced parameter(s): [${details.unproducedKeys.join(', ')}]. ` +
            `Available keys: [${details.availableKeys.join(', ')}]. ` +
            `Initial param keys: [${details.initialKeys.join(', ')}]`,
        );
        this.name = 'UnproducedParameterError';
        this.unitName = details.unitName;
        this.composerName = details.composerName;
        this.initialKeys = Object.freeze([...details.initialKeys]);
        this.availableKeys = Object.freeze([...details.availableKeys]);
        this.unproducedKeys = Object.freeze([...details.unproducedKeys]);
    }
}

/** A composer's wrapping scope was misconfigured or misbehaved. */
export class ComposerConfigurationError extends ConfigurationError {
    readonly composerName: string;

    constructor(composerName: string, detail: string) {
        super(`Composer "${composerName}": ${detail}`);
        this.name = 'ComposerConfigurationError';
        this.composerName = composerName;
    }
}

// ============================================================================
// Strict-Call Failure
// ============================================================================

/** Thrown by `callStrict()` when the Outcome is unsuccessful. */
export class FailureError extends UnitflowError {
    readonly messages: readonly string[];
    readonly outcome: OutcomeBase;

    constructor(outcome: OutcomeBase) {
        super(`Unit operation failed: ${outcome.messages.join(', ')}`);
        this.name = 'FailureError';
        this.messages = Object.freeze([...outcome.messages]);
        this.outcome = outcome;
    }
}
