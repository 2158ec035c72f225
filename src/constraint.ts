/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import { EQUAL, GREATER_OR_EQUAL, LESS_OR_EQUAL } from "./constants";
import { InvalidSenseError, ModelMismatchError } from "./errors";
import type { LinExpr } from "./expression";
import type { Model } from "./model";

/**
 * Rendered constraint lines are wrapped once they grow past this length.
 * @private
 */
const LINE_WIDTH = 75;

/**
 * A row of the constraint matrix.
 *
 * A constraint is a linear expression with a sense and a right hand
 * side, registered in a model:
 *
 * ```ts
 * const cn = model.addConstr(x.multiply(3).plus(y.multiply(4)).le(5), "cap");
 * cn.rhs;   // 5
 * ```
 *
 * Like `Var`, a constraint is a handle; its data lives in the model's solver.
 *
 * @class
 * @param {Model} model The owning model.
 * @param {Number} idx Index in the model's constraint table.
 */
export
class Constr {

    constructor(public readonly model: Model, public readonly idx: number) {}

    public is( other: Constr ): boolean {
        return this.model === other.model && this.idx === other.idx;
    }

    public get name(): string {
        return this.model.solver.constrGetName( this.idx );
    }

    /**
     * The right hand side (constant value) of the constraint.
     */
    public get rhs(): number {
        return this.model.solver.constrGetRhs( this.idx );
    }

    public set rhs( value: number ) {
        this.model.solver.constrSetRhs( this.idx, value );
    }

    /**
     * Slack of the constraint in the current solution.
     */
    public get slack(): number | undefined {
        return this.model.solver.constrGetSlack( this );
    }

    /**
     * Dual value of the constraint. Only available after a pure linear
     * program was optimized.
     */
    public get pi(): number | undefined {
        return this.model.solver.constrGetPi( this );
    }

    /**
     * The expression defining the constraint. Assigning replaces the row.
     */
    public get expr(): LinExpr {
        return this.model.solver.constrGetExpr( this );
    }

    public set expr( value: LinExpr ) {
        if ( value.sense === "" ) {
            throw new InvalidSenseError( value.sense );
        }
        let owner = value.model;
        if ( owner !== undefined && owner !== this.model ) {
            throw new ModelMismatchError( `constraint ${ this.idx } can not take variables of another model` );
        }
        this.model.solver.constrSetExpr( this, value );
    }

    public toString(): string {
        let expr = this.expr;
        let result = ( this.name || `constr(${ this.idx + 1 })` ) + ":";
        let lineLength = 0;
        for ( let term of expr.termList() ) {
            let item = " " + ( term.coeff >= 0 ? "+" : "" ) + term.coeff + " " + term.var.name;
            result += item;
            lineLength += item.length;
            if ( lineLength > LINE_WIDTH ) {
                result += "\n\t";
                lineLength = 0;
            }
        }
        let rhs = String( -expr.const );
        switch ( expr.sense ) {
            case EQUAL:
                return result + " = " + rhs;
            case LESS_OR_EQUAL:
                return result + " <= " + rhs;
            case GREATER_OR_EQUAL:
                return result + " >= " + rhs;
            default:
                throw new InvalidSenseError( expr.sense );
        }
    }

}
