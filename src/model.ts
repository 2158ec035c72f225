/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import { z } from "zod";

import { Column } from "./column";
import { ConflictGraph } from "./conflict";
import { ObjectiveSense, OptimizationStatus, VarType } from "./constants";
import { Constr } from "./constraint";
import { InvalidSenseError, ModelMismatchError } from "./errors";
import { LinExpr, Operand, xsum } from "./expression";
import { MemorySolver } from "./memory-solver";
import {
    checkBounds,
    ModelOptions,
    ModelOptionsSchema,
    parseOptions,
    VarOptions,
    VarOptionsSchema,
} from "./options";
import type { Solver } from "./solver";
import { Var } from "./variable";

/**
 * Builds the solver of a model. The solver receives the model so it can
 * hand out the model's variable and constraint handles.
 */
export type SolverFactory<S extends Solver> = ( model: Model<S> ) => S;

/**
 * A mixed-integer programming model.
 *
 * The model owns the tables of variable and constraint handles; all of
 * their data is kept by the solver.
 *
 * ```ts
 * const m = Model.create({ name: "knapsack", sense: ObjectiveSense.Maximize });
 * const x = m.addVar({ name: "x", varType: VarType.Binary });
 * const y = m.addVar({ name: "y", varType: VarType.Binary });
 * m.objective = x.multiply(10).plus(y.multiply(7));
 * m.addConstr(x.multiply(3).plus(y.multiply(4)).le(5), "capacity");
 * ```
 *
 * @class
 * @param {SolverFactory} createSolver Builds the solver for this model.
 * @param {ModelOptions} [options] Name and objective sense.
 */
export
class Model<S extends Solver = Solver> {

    /**
     * Creates a model backed by a MemorySolver.
     */
    public static create( options: ModelOptions = {} ): Model<MemorySolver> {
        return new Model<MemorySolver>( model => new MemorySolver( model ), options );
    }

    public readonly name: string;
    public readonly solver: S;
    public readonly conflictGraph: ConflictGraph;

    constructor( createSolver: SolverFactory<S>, options: ModelOptions = {} ) {
        let settings = parseOptions( ModelOptionsSchema, options, "model options" );
        this.name = settings.name;
        this.solver = createSolver( this );
        this.solver.setObjectiveSense( settings.sense );
        this.conflictGraph = new ConflictGraph( this );
    }

    public get vars(): readonly Var[] {
        return this.varList;
    }

    public get constrs(): readonly Constr[] {
        return this.constrList;
    }

    /**
     * Adds a decision variable. Binary variables are bounded to [0, 1].
     */
    public addVar( options: VarOptions = {} ): Var {
        let settings = parseOptions( VarOptionsSchema, options, "variable options" );
        let lb = settings.lb;
        let ub = settings.ub;
        if ( settings.varType === VarType.Binary ) {
            lb = Math.max( lb, 0.0 );
            ub = Math.min( ub, 1.0 );
            checkBounds( lb, ub, "variable options" );
        }
        let column = settings.column ?? new Column();
        for ( let constr of column.constrs ) {
            if ( constr.model !== this ) {
                throw new ModelMismatchError( `constraint ${ constr.idx } belongs to another model` );
            }
        }
        let variable = new Var( this, this.varList.length );
        this.solver.addVar( settings.name ?? "", lb, ub, settings.obj, settings.varType, column );
        this.varList.push( variable );
        return variable;
    }

    /**
     * Registers an expression with a sense as a constraint.
     */
    public addConstr( expr: LinExpr, name: string = "" ): Constr {
        if ( expr.sense === "" ) {
            throw new InvalidSenseError( expr.sense );
        }
        this.checkOwner( expr );
        let constr = new Constr( this, this.constrList.length );
        this.solver.addConstr( expr, name );
        this.constrList.push( constr );
        return constr;
    }

    public varByName( name: string ): Var | undefined {
        let idx = this.solver.varGetIndex( name );
        return idx !== undefined ? this.varList[ idx ] : undefined;
    }

    public constrByName( name: string ): Constr | undefined {
        let idx = this.solver.constrGetIndex( name );
        return idx !== undefined ? this.constrList[ idx ] : undefined;
    }

    /**
     * The objective function. Assigning a number, variable or expression
     * replaces it; the sense of an assigned expression is dropped.
     */
    public get objective(): LinExpr {
        return this.solver.getObjective();
    }

    public set objective( value: Operand ) {
        let expr = xsum( [ value ] );
        this.checkOwner( expr );
        this.solver.setObjective( expr );
    }

    public get sense(): ObjectiveSense {
        return this.solver.getObjectiveSense();
    }

    public set sense( value: ObjectiveSense ) {
        this.solver.setObjectiveSense( parseOptions( z.nativeEnum( ObjectiveSense ), value, "objective sense" ) );
    }

    public get status(): OptimizationStatus {
        return this.solver.getStatus();
    }

    public get objectiveValue(): number | undefined {
        return this.solver.getObjectiveValue();
    }

    public get numSolutions(): number {
        return this.solver.getNumSolutions();
    }

    public get numCols(): number {
        return this.solver.numCols();
    }

    public get numRows(): number {
        return this.solver.numRows();
    }

    public get numNz(): number {
        return this.solver.numNz();
    }

    private checkOwner( expr: LinExpr ): void {
        let owner = expr.model;
        if ( owner !== undefined && owner !== this ) {
            throw new ModelMismatchError( `expression refers to variables of model "${ owner.name }"` );
        }
    }

    private varList: Var[] = [];
    private constrList: Constr[] = [];
}
