/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import { EPS, EQUAL, GREATER_OR_EQUAL, isSense, LESS_OR_EQUAL, nearZero, Sense } from "./constants";
import {
    describeValue,
    InvalidCoefficientError,
    InvalidSenseError,
    LengthMismatchError,
    ModelMismatchError,
    TypeMismatchError,
} from "./errors";
import type { Model } from "./model";
import { Var } from "./variable";

/**
 * Anything that can be combined into a linear expression.
 */
export type Operand = number | Var | LinExpr;

/**
 * A variable with its coefficient inside an expression.
 */
export interface Term {
    readonly var: Var;
    readonly coeff: number;
}

/**
 * A sparse linear expression: a sum of variable terms and a constant,
 * optionally tagged with a relational sense.
 *
 * An expression with a sense is the body of a constraint written as
 * `expr sense 0`, so the right hand side is `-constant`:
 *
 * ```ts
 * const cn = x.plus(y).le(10);   // x + y - 10 <= 0
 * cn.const;                      // -10
 * ```
 *
 * @class
 * @param {Var[]} [variables=[]] Variables of the expression.
 * @param {Number[]} [coeffs=[]] Coefficients, one per variable.
 * @param {Number} [constant=0] Constant term.
 * @param {Sense} [sense=""] Relational sense.
 */
export
class LinExpr {

    private terms = new Map<number, Term>();
    private constant: number;
    private relation: Sense = "";

    constructor(
      variables: Var[] = [],
      coeffs: number[] = [],
      constant: number = 0.0,
      sense: Sense = "",
    ) {
        if ( variables.length !== coeffs.length ) {
            throw new LengthMismatchError(
                `got ${ variables.length } variables but ${ coeffs.length } coefficients`,
            );
        }
        this.constant = checkFinite( constant );
        this.sense = sense;
        for ( let i = 0, n = variables.length; i < n; ++i ) {
            this.addVar( variables[ i ], coeffs[ i ] );
        }
    }

    /**
     * The constant part of the expression.
     */
    public get const(): number {
        return this.constant;
    }

    /**
     * A snapshot of the non-constant part of the expression.
     *
     * The returned map is a copy; changing it does not change the expression.
     * Its keys are the handles the expression was built from, compared by
     * identity. Use `coefficient(var)` to look up any handle of a variable.
     */
    public get expr(): Map<Var, number> {
        let result = new Map<Var, number>();
        this.terms.forEach( term => result.set( term.var, term.coeff ) );
        return result;
    }

    public get size(): number {
        return this.terms.size;
    }

    /**
     * The relational sense: `"="`, `"<"`, `">"`, or `""` for an
     * affine expression such as an objective function.
     */
    public get sense(): Sense {
        return this.relation;
    }

    public set sense( value: Sense ) {
        if ( !isSense( value ) ) {
            throw new InvalidSenseError( value );
        }
        this.relation = value;
    }

    /**
     * The model owning the variables of this expression, or undefined
     * when the expression has no variables.
     */
    public get model(): Model | undefined {
        for ( let term of this.terms.values() ) {
            return term.var.model;
        }
        return undefined;
    }

    /**
     * Returns the coefficient of a variable, 0 when it does not appear.
     */
    public coefficient( variable: Var ): number {
        let term = this.terms.get( variable.idx );
        return term !== undefined && term.var.model === variable.model ? term.coeff : 0.0;
    }

    public has( variable: Var ): boolean {
        let term = this.terms.get( variable.idx );
        return term !== undefined && term.var.model === variable.model;
    }

    /**
     * Iterate over the variable terms in insertion order.
     */
    public termList(): Term[] {
        return Array.from( this.terms.values() );
    }

    public isConstant(): boolean {
        return this.terms.size === 0;
    }

    /**
     * Value of the expression in the current solution, or undefined
     * if any of its variables has no value.
     */
    public get x(): number | undefined {
        let value = this.constant;
        for ( let term of this.terms.values() ) {
            let x = term.var.x;
            if ( x === undefined ) {
                return undefined;
            }
            value += x * term.coeff;
        }
        return value;
    }

    /**
     * Amount by which the current solution violates this constraint,
     * or undefined if any of its variables has no value.
     */
    public get violation(): number | undefined {
        let lhs = 0.0;
        for ( let term of this.terms.values() ) {
            let x = term.var.x;
            if ( x === undefined ) {
                return undefined;
            }
            lhs += x * term.coeff;
        }
        let rhs = -this.constant;
        switch ( this.relation ) {
            case EQUAL:
                return Math.abs( lhs - rhs );
            case LESS_OR_EQUAL:
                return Math.max( lhs - rhs, 0.0 );
            case GREATER_OR_EQUAL:
                return Math.max( rhs - lhs, 0.0 );
            default:
                throw new InvalidSenseError( this.relation );
        }
    }

    /**
     * Creates a new expression by adding a number, variable or expression.
     */
    public plus( value: Operand ): LinExpr {
        let result = this.copy();
        combine( result, value, 1.0 );
        return result;
    }

    /**
     * Creates a new expression by subtracting a number, variable or expression.
     */
    public minus( value: Operand ): LinExpr {
        let result = this.copy();
        combine( result, value, -1.0 );
        return result;
    }

    /**
     * Creates a new expression by multiplying with a fixed number.
     */
    public multiply( coefficient: number ): LinExpr {
        checkScalar( coefficient, "multiply" );
        let result = new LinExpr( [], [], 0.0, this.relation );
        combine( result, this, coefficient );
        return result;
    }

    /**
     * Creates a new expression by dividing by a fixed number.
     */
    public divide( coefficient: number ): LinExpr {
        checkScalar( coefficient, "divide" );
        return this.multiply( 1.0 / coefficient );
    }

    public neg(): LinExpr {
        return this.multiply( -1.0 );
    }

    /**
     * Creates the constraint `this == value`.
     */
    public eq( value: Operand ): LinExpr {
        return this.relate( value, EQUAL );
    }

    /**
     * Creates the constraint `this <= value`.
     */
    public le( value: Operand ): LinExpr {
        return this.relate( value, LESS_OR_EQUAL );
    }

    /**
     * Creates the constraint `this >= value`.
     */
    public ge( value: Operand ): LinExpr {
        return this.relate( value, GREATER_OR_EQUAL );
    }

    /**
     * Adds a constant value. For a constraint this shifts the right hand side.
     */
    public addConst( value: number ): void {
        checkScalar( value, "add" );
        checkFinite( value );
        this.constant = checkFinite( this.constant + value );
    }

    /**
     * Adds the contents of another expression multiplied by a coefficient.
     * The sense of the other expression is ignored. The expression is left
     * unchanged when any of the resulting terms is rejected.
     */
    public addExpr( other: LinExpr, coefficient: number = 1.0 ): void {
        checkScalar( coefficient, "multiply" );
        checkFinite( coefficient );
        let owner = this.model;
        let theirs = other.model;
        if ( owner !== undefined && theirs !== undefined && owner !== theirs ) {
            throw new ModelMismatchError( "can not combine expressions of different models" );
        }
        let constant = checkFinite( this.constant + checkFinite( other.constant * coefficient ) );
        let terms = new Map( this.terms );
        for ( let term of other.termList() ) {
            insertTerm( terms, term.var, term.coeff * coefficient );
        }
        this.terms = terms;
        this.constant = constant;
    }

    /**
     * Adds a variable, expression or number multiplied by a coefficient.
     */
    public addTerm( term: Operand, coefficient: number = 1.0 ): void {
        combine( this, term, coefficient );
    }

    /**
     * Adds a variable with a coefficient.
     *
     * Coefficients are summed with an existing entry for the variable;
     * an entry whose coefficient falls within EPS of zero is dropped.
     */
    public addVar( variable: Var, coefficient: number = 1.0 ): void {
        insertTerm( this.terms, variable, coefficient );
    }

    /**
     * Multiplies the expression in place.
     */
    public scale( coefficient: number ): void {
        checkScalar( coefficient, "multiply" );
        checkFinite( coefficient );
        let constant = checkFinite( this.constant * coefficient );
        let terms = new Map<number, Term>();
        for ( let term of this.terms.values() ) {
            insertTerm( terms, term.var, term.coeff * coefficient );
        }
        this.terms = terms;
        this.constant = constant;
    }

    public copy(): LinExpr {
        let theCopy = new LinExpr( [], [], this.constant, this.relation );
        theCopy.terms = new Map( this.terms );
        return theCopy;
    }

    /**
     * Structural equality: same sense, same variables, coefficients
     * and constant within EPS. Insertion order is irrelevant.
     */
    public equals( other: LinExpr ): boolean {
        if ( this.relation !== other.relation ) {
            return false;
        }
        if ( this.terms.size !== other.terms.size ) {
            return false;
        }
        if ( !( Math.abs( this.constant - other.constant ) <= EPS ) ) {
            return false;
        }
        for ( let [ idx, term ] of this.terms ) {
            let match = other.terms.get( idx );
            if ( match === undefined || match.var.model !== term.var.model ) {
                return false;
            }
            if ( !( Math.abs( term.coeff - match.coeff ) <= EPS ) ) {
                return false;
            }
        }
        return true;
    }

    /**
     * A deterministic key built from the exact contents, independent of
     * insertion order. Equal keys imply `equals`.
     */
    public hashKey(): string {
        let cells = Array.from( this.terms.entries() )
            .sort( ( a, b ) => a[ 0 ] - b[ 0 ] )
            .map( ( [ idx, term ] ) => idx + ":" + term.coeff );
        return [ this.relation, this.constant, ...cells ].join( "|" );
    }

    public toString(): string {
        let result = this.termList().map( term => {
            let magnitude = Math.abs( term.coeff );
            return ( term.coeff >= 0 ? "+ " : "- " )
                + ( magnitude !== 1 ? magnitude + " " : "" )
                + term.var.name;
        } );

        switch ( this.relation ) {
            case "":
                if ( this.constant !== 0 ) {
                    result.push( ( this.constant > 0 ? "+ " : "- " ) + Math.abs( this.constant ) );
                } else if ( result.length === 0 ) {
                    result.push( "0" );
                }
                break;
            case EQUAL:
            case LESS_OR_EQUAL:
            case GREATER_OR_EQUAL:
                if ( result.length === 0 ) {
                    result.push( "0" );
                }
                result.push( SENSE_SYMBOLS[ this.relation ], String( -this.constant ) );
                break;
            default:
                throw new InvalidSenseError( this.relation );
        }

        return result.join( " " );
    }

    private relate( value: Operand, sense: Sense ): LinExpr {
        let result = this.minus( value );
        result.relation = sense;
        return result;
    }

}

const SENSE_SYMBOLS: Record<Sense, string> = {
    "": "",
    "=": "=",
    "<": "<=",
    ">": ">=",
};

/**
 * Sums numbers, variables and expressions into a single expression.
 *
 * ```ts
 * const total = xsum(items.map((v, i) => v.multiply(weights[i])));
 * ```
 */
export function xsum( terms: Iterable<Operand> ): LinExpr {
    let result = new LinExpr();
    for ( let term of terms ) {
        combine( result, term, 1.0 );
    }
    return result;
}

/**
 * Fail unless the value is a number.
 * @private
 */
export function checkScalar( value: unknown, operation: string ): asserts value is number {
    if ( typeof value !== "number" ) {
        throw new TypeMismatchError(
            `can not ${ operation } with type ${ describeValue( value ) }`,
            describeValue( value ),
        );
    }
}

/**
 * The single dispatch point behind every arithmetic operation: adds
 * `term * coefficient` to the target expression in place.
 * @private
 */
function combine( target: LinExpr, term: Operand, coefficient: number ): void {
    checkScalar( coefficient, "multiply" );
    checkFinite( coefficient );
    if ( typeof term === "number" ) {
        target.addConst( term * coefficient );
    } else if ( term instanceof Var ) {
        target.addVar( term, coefficient );
    } else if ( term instanceof LinExpr ) {
        target.addExpr( term, coefficient );
    } else {
        throw new TypeMismatchError(
            `type ${ describeValue( term ) } not supported`,
            describeValue( term ),
        );
    }
}

/**
 * Fail unless the value is a finite number.
 * @private
 */
function checkFinite( value: number ): number {
    if ( !Number.isFinite( value ) ) {
        throw new InvalidCoefficientError( value );
    }
    return value;
}

/**
 * Adds `coefficient * variable` to a term map, pruning near-zero results.
 * Throws before touching the map when the term is rejected.
 * @private
 */
function insertTerm( terms: Map<number, Term>, variable: Var, coefficient: number ): void {
    checkFinite( coefficient );
    let first = terms.values().next();
    if ( !first.done && first.value.var.model !== variable.model ) {
        throw new ModelMismatchError(
            `variable ${ variable.idx } belongs to another model than the expression`,
        );
    }
    let current = terms.get( variable.idx );
    let coeff = checkFinite( ( current !== undefined ? current.coeff : 0.0 ) + coefficient );
    if ( nearZero( coeff ) ) {
        terms.delete( variable.idx );
    } else {
        terms.set( variable.idx, { var: current !== undefined ? current.var : variable, coeff } );
    }
}
