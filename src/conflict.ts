/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import { EQUAL, nearZero, VarType } from "./constants";
import { describeValue, InvalidLiteralError, ModelMismatchError, TypeMismatchError } from "./errors";
import { LinExpr } from "./expression";
import type { Model } from "./model";
import type { ConflictingAssignments, Literal } from "./solver";
import { Var } from "./variable";

/**
 * Conflicts between assignments of binary variables.
 *
 * A constraint `x1 + x2 <= 1` puts `x1 == 1` and `x2 == 1` in conflict.
 * Conflicts can involve complements too: `x1 <= x2` puts `x1 == 1` and
 * `x2 == 0` in conflict. A bare variable stands for the assignment to one,
 * an expression `x.eq(0)` for the assignment to zero.
 *
 * The graph itself is kept by the solver; every query is answered live.
 */
export
class ConflictGraph {

    constructor( public readonly model: Model ) {}

    /**
     * Returns true if the two assignments can not hold at the same time.
     */
    public conflicting( e1: Var | LinExpr, e2: Var | LinExpr ): boolean {
        let a = toLiteral( e1 );
        let b = toLiteral( e2 );
        this.checkOwner( a );
        this.checkOwner( b );
        return this.model.solver.conflicting( a, b );
    }

    /**
     * Returns all assignments conflicting with the given one, split into
     * variables conflicting when set to one and when set to zero.
     */
    public conflictingAssignments( e: Var | LinExpr ): ConflictingAssignments {
        let literal = toLiteral( e );
        this.checkOwner( literal );
        return this.model.solver.conflictingNodes( literal );
    }

    private checkOwner( literal: Literal ): void {
        if ( literal.var.model !== this.model ) {
            throw new ModelMismatchError( `variable ${ literal.var.idx } belongs to another model` );
        }
        if ( literal.var.varType !== VarType.Binary ) {
            throw new InvalidLiteralError( `variable ${ literal.var.name } is not binary` );
        }
    }

}

/**
 * Convert a variable or an `x == 0` expression into a literal.
 * @private
 */
export function toLiteral( e: Var | LinExpr ): Literal {
    if ( e instanceof Var ) {
        return { kind: "positive", var: e };
    }
    if ( e instanceof LinExpr ) {
        let terms = e.termList();
        if ( e.sense !== EQUAL || terms.length !== 1 || !nearZero( e.const ) ) {
            throw new InvalidLiteralError( `expected an expression of the form x == 0, got ${ e.toString() }` );
        }
        return { kind: "negative", var: terms[ 0 ].var };
    }
    throw new TypeMismatchError( `type ${ describeValue( e ) } not supported`, describeValue( e ) );
}
