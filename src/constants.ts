/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

/**
 * Tolerance below which a coefficient is treated as zero.
 */
export const EPS = 1e-12;

export const INF = Number.POSITIVE_INFINITY;

/**
 * Test whether a value is approximately zero.
 * @private
 */
export function nearZero( value: number ): boolean {
    return value < 0.0 ? -value <= EPS : value <= EPS;
}

/**
 * An enum defining the decision variable types.
 *
 * |Value|Code|Description|
 * |----|-----|-----|
 * |`Binary`|B|0/1 variable|
 * |`Continuous`|C|real valued variable|
 * |`Integer`|I|integer valued variable|
 */
export
enum VarType {
    Binary = "B",
    Continuous = "C",
    Integer = "I",
}

const VAR_TYPES: ReadonlySet<string> = new Set<string>( Object.values( VarType ) );

export function isVarType( value: unknown ): value is VarType {
    return typeof value === "string" && VAR_TYPES.has( value );
}

/**
 * The relational sense of an expression. The empty sense marks a plain
 * affine expression such as an objective function.
 */
export type Sense = "" | "=" | "<" | ">";

export const EQUAL = "=";
export const LESS_OR_EQUAL = "<";
export const GREATER_OR_EQUAL = ">";

const SENSES: ReadonlySet<string> = new Set<string>( [ "", EQUAL, LESS_OR_EQUAL, GREATER_OR_EQUAL ] );

export function isSense( value: unknown ): value is Sense {
    return typeof value === "string" && SENSES.has( value );
}

export
enum ObjectiveSense {
    Minimize = "MIN",
    Maximize = "MAX",
}

/**
 * Status of the last optimization of a model.
 */
export
enum OptimizationStatus {
    Error = -1,
    Optimal = 0,
    Infeasible = 1,
    Unbounded = 2,
    Feasible = 3,
    IntInfeasible = 4,
    NoSolutionFound = 5,
    Loaded = 6,
    Cutoff = 7,
    Other = 10000,
}
