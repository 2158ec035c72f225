/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import type { Constr } from "./constraint";
import { InvalidCoefficientError, LengthMismatchError } from "./errors";

/**
 * All the non-zero entries of one variable in the constraint matrix.
 *
 * `constrs[i]` is paired with `coeffs[i]`. Both lists are frozen copies
 * of the constructor arguments.
 *
 * @class
 * @param {Constr[]} [constrs=[]] Constraints the variable appears in.
 * @param {Number[]} [coeffs=[]] Coefficients of the variable in those constraints.
 */
export
class Column {

    public readonly constrs: readonly Constr[];
    public readonly coeffs: readonly number[];

    constructor( constrs: readonly Constr[] = [], coeffs: readonly number[] = [] ) {
        if ( constrs.length !== coeffs.length ) {
            throw new LengthMismatchError(
                `column has ${ constrs.length } constraints but ${ coeffs.length } coefficients`,
            );
        }
        for ( let coeff of coeffs ) {
            if ( !Number.isFinite( coeff ) ) {
                throw new InvalidCoefficientError( coeff );
            }
        }
        this.constrs = Object.freeze( constrs.slice() );
        this.coeffs = Object.freeze( coeffs.slice() );
    }

    public get size(): number {
        return this.constrs.length;
    }

    public toString(): string {
        return "[" + this.constrs.map(
            ( constr, k ) => this.coeffs[ k ] + " " + constr.name,
        ).join( ", " ) + "]";
    }

}
