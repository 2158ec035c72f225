/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import type { Column } from "./column";
import { EQUAL, GREATER_OR_EQUAL, isVarType, LESS_OR_EQUAL, OptimizationStatus, Sense, VarType } from "./constants";
import { InvalidVariableTypeError } from "./errors";
import { checkScalar, LinExpr, Operand } from "./expression";
import type { Model } from "./model";
import { BoundSchema, checkBounds, ObjSchema, parseOptions } from "./options";

/**
 * A decision variable of a model.
 *
 * A variable is a handle: it stores only its model and its index in the
 * model's variable table. Every attribute is read from and written to the
 * model's solver. Variables are created with `Model.addVar`.
 *
 * @class
 * @param {Model} model The owning model.
 * @param {Number} idx Index in the model's variable table.
 */
export
class Var {

    /**
     * A static variable comparison function.
     * @private
     */
    public static Compare(a: Var, b: Var): number {
        return a.idx - b.idx;
    }

    constructor(public readonly model: Model, public readonly idx: number) {}

    /**
     * Returns true if both handles refer to the same variable.
     */
    public is( other: Var ): boolean {
        return this.model === other.model && this.idx === other.idx;
    }

    public get name(): string {
        return this.model.solver.varGetName( this.idx );
    }

    public set name( value: string ) {
        this.model.solver.varSetName( this.idx, value );
    }

    /**
     * Lower bound. May not exceed the upper bound.
     */
    public get lb(): number {
        return this.model.solver.varGetLb( this );
    }

    public set lb( value: number ) {
        let lb = parseOptions( BoundSchema, value, "lower bound" );
        checkBounds( lb, this.ub, "lower bound" );
        this.model.solver.varSetLb( this, lb );
    }

    /**
     * Upper bound.
     */
    public get ub(): number {
        return this.model.solver.varGetUb( this );
    }

    public set ub( value: number ) {
        let ub = parseOptions( BoundSchema, value, "upper bound" );
        checkBounds( this.lb, ub, "upper bound" );
        this.model.solver.varSetUb( this, ub );
    }

    /**
     * Coefficient of the variable in the objective function.
     */
    public get obj(): number {
        return this.model.solver.varGetObj( this );
    }

    public set obj( value: number ) {
        this.model.solver.varSetObj( this, parseOptions( ObjSchema, value, "objective coefficient" ) );
    }

    public get varType(): VarType {
        return this.model.solver.varGetVarType( this );
    }

    /**
     * Making a variable binary clips its bounds to [0, 1]; bounds outside
     * that range are rejected.
     */
    public set varType( value: VarType ) {
        if ( !isVarType( value ) ) {
            throw new InvalidVariableTypeError( value );
        }
        if ( value === VarType.Binary ) {
            checkBounds( Math.max( this.lb, 0.0 ), Math.min( this.ub, 1.0 ), "variable type" );
        }
        this.model.solver.varSetVarType( this, value );
    }

    /**
     * Coefficients of the variable in the constraints.
     */
    public get column(): Column {
        return this.model.solver.varGetColumn( this );
    }

    public set column( value: Column ) {
        this.model.solver.varSetColumn( this, value );
    }

    /**
     * Reduced cost. Only available after a pure linear program was optimized.
     */
    public get rc(): number | undefined {
        return this.model.solver.varGetRc( this );
    }

    /**
     * Value in the current solution, undefined if there is none.
     */
    public get x(): number | undefined {
        return this.model.solver.varGetX( this );
    }

    /**
     * Value in the i-th solution of the solution pool, undefined if the
     * solution is not available.
     */
    public xi( i: number ): number | undefined {
        let status = this.model.status;
        if ( status === OptimizationStatus.Optimal || status === OptimizationStatus.Feasible ) {
            return this.model.solver.varGetXi( this, i );
        }
        return undefined;
    }

    /**
     * Creates a new expression by adding a number, variable or expression
     * to the variable.
     */
    public plus( value: Operand ): LinExpr {
        let result = new LinExpr( [ this ], [ 1.0 ] );
        result.addTerm( value, 1.0 );
        return result;
    }

    /**
     * Creates a new expression by subtracting a number, variable or
     * expression from the variable.
     */
    public minus( value: Operand ): LinExpr {
        let result = new LinExpr( [ this ], [ 1.0 ] );
        result.addTerm( value, -1.0 );
        return result;
    }

    /**
     * Creates a new expression by multiplying with a fixed number.
     */
    public multiply( coefficient: number ): LinExpr {
        checkScalar( coefficient, "multiply" );
        return new LinExpr( [ this ], [ coefficient ] );
    }

    /**
     * Creates a new expression by dividing by a fixed number.
     */
    public divide( coefficient: number ): LinExpr {
        checkScalar( coefficient, "divide" );
        return new LinExpr( [ this ], [ 1.0 / coefficient ] );
    }

    public neg(): LinExpr {
        return new LinExpr( [ this ], [ -1.0 ] );
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

    public toString(): string {
        return this.name;
    }

    private relate( value: Operand, sense: Sense ): LinExpr {
        let result = this.minus( value );
        result.sense = sense;
        return result;
    }

}
