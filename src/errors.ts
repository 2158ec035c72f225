/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

export type ModelErrorCode =
    | "TYPE_MISMATCH"
    | "LENGTH_MISMATCH"
    | "INVALID_SENSE"
    | "INVALID_VAR_TYPE"
    | "MODEL_MISMATCH"
    | "INVALID_COEFFICIENT"
    | "INVALID_LITERAL"
    | "INVALID_OPTIONS";

/**
 * Base class of every error raised by the modeling layer.
 */
export class ModelError extends Error {
    constructor( message: string, public readonly code: ModelErrorCode ) {
        super( message );
        this.name = "ModelError";
    }
}

/**
 * Describe a runtime value for error messages.
 * @private
 */
export function describeValue( value: unknown ): string {
    if ( value === null ) {
        return "null";
    }
    if ( typeof value === "object" ) {
        return value.constructor ? value.constructor.name : "object";
    }
    return typeof value;
}

export class TypeMismatchError extends ModelError {
    constructor( message: string, public readonly received: string ) {
        super( message, "TYPE_MISMATCH" );
        this.name = "TypeMismatchError";
    }
}

export class LengthMismatchError extends ModelError {
    constructor( message: string ) {
        super( message, "LENGTH_MISMATCH" );
        this.name = "LengthMismatchError";
    }
}

export class InvalidSenseError extends ModelError {
    constructor( public readonly sense: unknown ) {
        super( `invalid sense ${ JSON.stringify( sense ) }`, "INVALID_SENSE" );
        this.name = "InvalidSenseError";
    }
}

export class InvalidVariableTypeError extends ModelError {
    constructor( public readonly varType: unknown ) {
        super( `expected one of B, C, I, but got ${ JSON.stringify( varType ) }`, "INVALID_VAR_TYPE" );
        this.name = "InvalidVariableTypeError";
    }
}

export class ModelMismatchError extends ModelError {
    constructor( message: string ) {
        super( message, "MODEL_MISMATCH" );
        this.name = "ModelMismatchError";
    }
}

export class InvalidCoefficientError extends ModelError {
    constructor( public readonly coefficient: number ) {
        super( `expected a finite number, got ${ coefficient }`, "INVALID_COEFFICIENT" );
        this.name = "InvalidCoefficientError";
    }
}

export class InvalidLiteralError extends ModelError {
    constructor( message: string ) {
        super( message, "INVALID_LITERAL" );
        this.name = "InvalidLiteralError";
    }
}

export class InvalidOptionsError extends ModelError {
    constructor( message: string, public readonly issues: string[] ) {
        super( message, "INVALID_OPTIONS" );
        this.name = "InvalidOptionsError";
    }
}
