/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import type { Column } from "./column";
import type { ObjectiveSense, OptimizationStatus, VarType } from "./constants";
import type { Constr } from "./constraint";
import type { LinExpr } from "./expression";
import type { Var } from "./variable";

/**
 * An assignment of a binary variable: `x == 1` (positive) or `x == 0`
 * (negative).
 */
export type Literal =
    | { readonly kind: "positive"; readonly var: Var }
    | { readonly kind: "negative"; readonly var: Var };

/**
 * Variables in conflict with a literal: those conflicting when set to one,
 * and those conflicting when set to zero.
 */
export type ConflictingAssignments = [ atOne: Var[], atZero: Var[] ];

/**
 * The solver capability a model delegates to.
 *
 * A solver owns every piece of mutable or solved state of a model: bounds,
 * names, types, rows, the objective, solution values and dual information.
 * Variable and constraint handles forward each read and write here.
 */
export interface Solver {
    addVar( name: string, lb: number, ub: number, obj: number, varType: VarType, column: Column ): void;
    addConstr( expr: LinExpr, name: string ): void;

    getObjective(): LinExpr;
    setObjective( expr: LinExpr ): void;
    getObjectiveSense(): ObjectiveSense;
    setObjectiveSense( sense: ObjectiveSense ): void;
    getObjectiveValue(): number | undefined;
    getStatus(): OptimizationStatus;
    getNumSolutions(): number;

    numCols(): number;
    numRows(): number;
    numNz(): number;

    varGetIndex( name: string ): number | undefined;
    varGetName( idx: number ): string;
    varSetName( idx: number, name: string ): void;
    varGetLb( variable: Var ): number;
    varSetLb( variable: Var, value: number ): void;
    varGetUb( variable: Var ): number;
    varSetUb( variable: Var, value: number ): void;
    varGetObj( variable: Var ): number;
    varSetObj( variable: Var, value: number ): void;
    varGetVarType( variable: Var ): VarType;
    varSetVarType( variable: Var, value: VarType ): void;
    varGetColumn( variable: Var ): Column;
    varSetColumn( variable: Var, value: Column ): void;
    varGetRc( variable: Var ): number | undefined;
    varGetX( variable: Var ): number | undefined;
    varGetXi( variable: Var, i: number ): number | undefined;

    constrGetIndex( name: string ): number | undefined;
    constrGetName( idx: number ): string;
    constrGetRhs( idx: number ): number;
    constrSetRhs( idx: number, rhs: number ): void;
    constrGetExpr( constr: Constr ): LinExpr;
    constrSetExpr( constr: Constr, value: LinExpr ): void;
    constrGetSlack( constr: Constr ): number | undefined;
    constrGetPi( constr: Constr ): number | undefined;

    conflicting( a: Literal, b: Literal ): boolean;
    conflictingNodes( literal: Literal ): ConflictingAssignments;
}
