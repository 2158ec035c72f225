/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import { Column } from "./column";
import {
    EQUAL,
    GREATER_OR_EQUAL,
    LESS_OR_EQUAL,
    ObjectiveSense,
    OptimizationStatus,
    Sense,
    VarType,
} from "./constants";
import type { Constr } from "./constraint";
import { InvalidOptionsError, ModelMismatchError } from "./errors";
import { LinExpr } from "./expression";
import type { Model } from "./model";
import { parseOptions, SolutionData, SolutionDataSchema, SolutionInput } from "./options";
import { Row } from "./row";
import type { ConflictingAssignments, Literal, Solver } from "./solver";
import type { Var } from "./variable";

/**
 * Row activity must pass the right hand side by more than this to
 * count as a conflict.
 * @private
 */
const FEASIBILITY_TOL = 1e-9;

interface VarData {
    name: string;
    lb: number;
    ub: number;
    varType: VarType;
}

interface ConstrData {
    name: string;
    row: Row;
    sense: Sense;
}

/**
 * A solver that keeps the model in memory and runs no optimization.
 *
 * Results computed elsewhere are injected with `loadSolution`. Any change
 * to the model discards the loaded solution.
 *
 * @class
 * @param {Model} model The model whose handles this solver hands out.
 */
export
class MemorySolver implements Solver {

    constructor( private readonly model: Model ) {}

    public addVar( name: string, lb: number, ub: number, obj: number, varType: VarType, column: Column ): void {
        let rows = column.constrs.map( constr => this.rowOf( constr ) );
        let idx = this.vars.length;
        this.vars.push( { name: this.uniqueName( name, `var(${ idx })`, this.varNames ), lb, ub, varType } );
        this.varNames.set( this.vars[ idx ].name, idx );
        this.objective.insert( idx, obj );
        rows.forEach( ( row, k ) => row.insert( idx, column.coeffs[ k ] ) );
        this.invalidate();
    }

    public addConstr( expr: LinExpr, name: string ): void {
        let idx = this.constrs.length;
        this.constrs.push( {
            name: this.uniqueName( name, `constr(${ idx })`, this.constrNames ),
            row: toRow( expr ),
            sense: expr.sense,
        } );
        this.constrNames.set( this.constrs[ idx ].name, idx );
        this.invalidate();
    }

    public getObjective(): LinExpr {
        return this.toExpr( this.objective, "" );
    }

    public setObjective( expr: LinExpr ): void {
        this.objective = toRow( expr );
        this.invalidate();
    }

    public getObjectiveSense(): ObjectiveSense {
        return this.objectiveSense;
    }

    public setObjectiveSense( sense: ObjectiveSense ): void {
        this.objectiveSense = sense;
        this.invalidate();
    }

    /**
     * Objective value of the loaded solution: the value supplied with it,
     * or the objective evaluated at the solution.
     */
    public getObjectiveValue(): number | undefined {
        let solution = this.solution;
        if ( solution === undefined ) {
            return undefined;
        }
        if ( solution.objectiveValue !== undefined ) {
            return solution.objectiveValue;
        }
        return activity( this.objective, solution.x ) + this.objective.constant;
    }

    public getStatus(): OptimizationStatus {
        return this.status;
    }

    public getNumSolutions(): number {
        if ( this.solution === undefined ) {
            return 0;
        }
        return this.solution.pool !== undefined ? this.solution.pool.length : 1;
    }

    public numCols(): number {
        return this.vars.length;
    }

    public numRows(): number {
        return this.constrs.length;
    }

    public numNz(): number {
        return this.constrs.reduce( ( total, data ) => total + data.row.size, 0 );
    }

    public varGetIndex( name: string ): number | undefined {
        return this.varNames.get( name );
    }

    public varGetName( idx: number ): string {
        return this.vars[ idx ].name;
    }

    /**
     * Renames a variable. A name held by another variable gets a suffix,
     * as in `addVar`.
     */
    public varSetName( idx: number, name: string ): void {
        let data = this.vars[ idx ];
        this.varNames.delete( data.name );
        data.name = this.uniqueName( name, `var(${ idx })`, this.varNames );
        this.varNames.set( data.name, idx );
    }

    public varGetLb( variable: Var ): number {
        return this.vars[ variable.idx ].lb;
    }

    public varSetLb( variable: Var, value: number ): void {
        this.vars[ variable.idx ].lb = value;
        this.invalidate();
    }

    public varGetUb( variable: Var ): number {
        return this.vars[ variable.idx ].ub;
    }

    public varSetUb( variable: Var, value: number ): void {
        this.vars[ variable.idx ].ub = value;
        this.invalidate();
    }

    public varGetObj( variable: Var ): number {
        return this.objective.coefficientFor( variable.idx );
    }

    public varSetObj( variable: Var, value: number ): void {
        this.objective.remove( variable.idx );
        this.objective.insert( variable.idx, value );
        this.invalidate();
    }

    public varGetVarType( variable: Var ): VarType {
        return this.vars[ variable.idx ].varType;
    }

    /**
     * Binary variables get their bounds clipped to [0, 1].
     */
    public varSetVarType( variable: Var, value: VarType ): void {
        let data = this.vars[ variable.idx ];
        data.varType = value;
        if ( value === VarType.Binary ) {
            data.lb = Math.max( data.lb, 0.0 );
            data.ub = Math.min( data.ub, 1.0 );
        }
        this.invalidate();
    }

    public varGetColumn( variable: Var ): Column {
        let constrs: Constr[] = [];
        let coeffs: number[] = [];
        this.constrs.forEach( ( data, k ) => {
            let coeff = data.row.coefficientFor( variable.idx );
            if ( coeff !== 0.0 ) {
                constrs.push( this.model.constrs[ k ] );
                coeffs.push( coeff );
            }
        } );
        return new Column( constrs, coeffs );
    }

    /**
     * Replaces every coefficient of the variable in the constraint matrix.
     */
    public varSetColumn( variable: Var, value: Column ): void {
        let rows = value.constrs.map( constr => this.rowOf( constr ) );
        for ( let data of this.constrs ) {
            data.row.remove( variable.idx );
        }
        rows.forEach( ( row, k ) => row.insert( variable.idx, value.coeffs[ k ] ) );
        this.invalidate();
    }

    public varGetRc( variable: Var ): number | undefined {
        let rc = this.solution?.rc;
        if ( rc === undefined || !this.isPureLp() ) {
            return undefined;
        }
        return rc[ variable.idx ];
    }

    public varGetX( variable: Var ): number | undefined {
        let solution = this.solution;
        if ( solution === undefined ) {
            return undefined;
        }
        return solution.x[ variable.idx ];
    }

    /**
     * Value in the i-th pool solution. Without a pool, solution 0 is the
     * loaded solution.
     */
    public varGetXi( variable: Var, i: number ): number | undefined {
        let solution = this.solution;
        if ( solution === undefined ) {
            return undefined;
        }
        let pool = solution.pool ?? [ solution.x ];
        if ( !Number.isInteger( i ) || i < 0 || i >= pool.length ) {
            return undefined;
        }
        return pool[ i ][ variable.idx ];
    }

    public constrGetIndex( name: string ): number | undefined {
        return this.constrNames.get( name );
    }

    public constrGetName( idx: number ): string {
        return this.constrs[ idx ].name;
    }

    public constrGetRhs( idx: number ): number {
        return -this.constrs[ idx ].row.constant;
    }

    public constrSetRhs( idx: number, rhs: number ): void {
        this.constrs[ idx ].row.constant = -rhs;
        this.invalidate();
    }

    public constrGetExpr( constr: Constr ): LinExpr {
        let data = this.constrs[ constr.idx ];
        return this.toExpr( data.row, data.sense );
    }

    public constrSetExpr( constr: Constr, value: LinExpr ): void {
        let data = this.constrs[ constr.idx ];
        data.row = toRow( value );
        data.sense = value.sense;
        this.invalidate();
    }

    /**
     * Slack `rhs - activity` in the loaded solution.
     */
    public constrGetSlack( constr: Constr ): number | undefined {
        let solution = this.solution;
        if ( solution === undefined ) {
            return undefined;
        }
        let row = this.constrs[ constr.idx ].row;
        return -row.constant - activity( row, solution.x );
    }

    public constrGetPi( constr: Constr ): number | undefined {
        let pi = this.solution?.pi;
        if ( pi === undefined || !this.isPureLp() ) {
            return undefined;
        }
        return pi[ constr.idx ];
    }

    /**
     * Loads the result of an optimization. The solution values are kept
     * only for the statuses `Optimal` and `Feasible`.
     */
    public loadSolution( input: SolutionInput ): void {
        let data = parseOptions( SolutionDataSchema, input, "solution" );
        this.status = data.status;
        this.solution = undefined;
        if ( data.status !== OptimizationStatus.Optimal && data.status !== OptimizationStatus.Feasible ) {
            return;
        }
        let issues: string[] = [];
        let cols = this.vars.length;
        if ( data.x.length !== cols ) {
            issues.push( `x: expected ${ cols } values, got ${ data.x.length }` );
        }
        ( data.pool ?? [] ).forEach( ( values, i ) => {
            if ( values.length !== cols ) {
                issues.push( `pool.${ i }: expected ${ cols } values, got ${ values.length }` );
            }
        } );
        if ( data.rc !== undefined && data.rc.length !== cols ) {
            issues.push( `rc: expected ${ cols } values, got ${ data.rc.length }` );
        }
        if ( data.pi !== undefined && data.pi.length !== this.constrs.length ) {
            issues.push( `pi: expected ${ this.constrs.length } values, got ${ data.pi.length }` );
        }
        if ( issues.length > 0 ) {
            this.status = OptimizationStatus.Error;
            throw new InvalidOptionsError( `invalid solution: ${ issues.join( "; " ) }`, issues );
        }
        this.solution = data;
    }

    public clearSolution(): void {
        this.invalidate();
    }

    /**
     * Records a conflict that is not implied by the constraint rows.
     */
    public addConflict( a: Literal, b: Literal ): void {
        this.checkLiteral( a );
        this.checkLiteral( b );
        this.conflicts.add( pairKey( a, b ) );
    }

    /**
     * Two literals conflict when they were recorded as conflicting, when
     * they assign opposite values to one variable, or when fixing both
     * pushes some row past its right hand side whatever values the other
     * variables of the row take within their bounds.
     */
    public conflicting( a: Literal, b: Literal ): boolean {
        if ( a.var.idx === b.var.idx ) {
            return a.kind !== b.kind;
        }
        if ( this.conflicts.has( pairKey( a, b ) ) ) {
            return true;
        }
        return this.constrs.some( data => this.rowConflict( data, a, b ) );
    }

    public conflictingNodes( literal: Literal ): ConflictingAssignments {
        let atOne: Var[] = [];
        let atZero: Var[] = [];
        this.vars.forEach( ( data, idx ) => {
            if ( idx === literal.var.idx || data.varType !== VarType.Binary ) {
                return;
            }
            let other = this.model.vars[ idx ];
            if ( this.conflicting( literal, { kind: "positive", var: other } ) ) {
                atOne.push( other );
            }
            if ( this.conflicting( literal, { kind: "negative", var: other } ) ) {
                atZero.push( other );
            }
        } );
        return [ atOne, atZero ];
    }

    private rowConflict( data: ConstrData, a: Literal, b: Literal ): boolean {
        let row = data.row;
        let ca = row.coefficientFor( a.var.idx );
        let cb = row.coefficientFor( b.var.idx );
        if ( ca === 0.0 || cb === 0.0 ) {
            return false;
        }
        let fixed = ca * literalValue( a ) + cb * literalValue( b );
        let min = fixed;
        let max = fixed;
        for ( let [ idx, coeff ] of row.entries() ) {
            if ( idx === a.var.idx || idx === b.var.idx ) {
                continue;
            }
            let bounds = this.vars[ idx ];
            let low = coeff * bounds.lb;
            let high = coeff * bounds.ub;
            min += Math.min( low, high );
            max += Math.max( low, high );
        }
        let rhs = -row.constant;
        let above = min > rhs + FEASIBILITY_TOL;
        let below = max < rhs - FEASIBILITY_TOL;
        switch ( data.sense ) {
            case LESS_OR_EQUAL:
                return above;
            case GREATER_OR_EQUAL:
                return below;
            case EQUAL:
                return above || below;
            default:
                return false;
        }
    }

    private checkLiteral( literal: Literal ): void {
        if ( literal.var.model !== this.model ) {
            throw new ModelMismatchError( `variable ${ literal.var.idx } belongs to another model` );
        }
    }

    private rowOf( constr: Constr ): Row {
        if ( constr.model !== this.model ) {
            throw new ModelMismatchError( `constraint ${ constr.idx } belongs to another model` );
        }
        return this.constrs[ constr.idx ].row;
    }

    private toExpr( row: Row, sense: Sense ): LinExpr {
        let vars: Var[] = [];
        let coeffs: number[] = [];
        for ( let [ idx, coeff ] of row.entries() ) {
            vars.push( this.model.vars[ idx ] );
            coeffs.push( coeff );
        }
        return new LinExpr( vars, coeffs, row.constant, sense );
    }

    private isPureLp(): boolean {
        return this.vars.every( data => data.varType === VarType.Continuous );
    }

    private uniqueName( name: string, fallback: string, names: Map<string, number> ): string {
        let result = name || fallback;
        let suffix = 1;
        while ( names.has( result ) ) {
            result = `${ name || fallback }_${ suffix++ }`;
        }
        return result;
    }

    private invalidate(): void {
        this.solution = undefined;
        this.status = OptimizationStatus.Loaded;
    }

    private vars: VarData[] = [];
    private constrs: ConstrData[] = [];
    private varNames = new Map<string, number>();
    private constrNames = new Map<string, number>();
    private objective = new Row();
    private objectiveSense = ObjectiveSense.Minimize;
    private status = OptimizationStatus.Loaded;
    private solution: SolutionData | undefined = undefined;
    private conflicts = new Set<string>();
}

function toRow( expr: LinExpr ): Row {
    let row = new Row( expr.const );
    for ( let term of expr.termList() ) {
        row.insert( term.var.idx, term.coeff );
    }
    return row;
}

function activity( row: Row, x: number[] ): number {
    let total = 0.0;
    for ( let [ idx, coeff ] of row.entries() ) {
        total += coeff * x[ idx ];
    }
    return total;
}

function literalValue( literal: Literal ): number {
    return literal.kind === "positive" ? 1.0 : 0.0;
}

function literalKey( literal: Literal ): string {
    return ( literal.kind === "positive" ? "+" : "-" ) + literal.var.idx;
}

function pairKey( a: Literal, b: Literal ): string {
    let keys = [ literalKey( a ), literalKey( b ) ].sort();
    return keys[ 0 ] + "|" + keys[ 1 ];
}
