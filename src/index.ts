/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

export { Column } from "./column";
export { ConflictGraph } from "./conflict";
export {
    EPS,
    EQUAL,
    GREATER_OR_EQUAL,
    INF,
    LESS_OR_EQUAL,
    ObjectiveSense,
    OptimizationStatus,
    VarType,
} from "./constants";
export type { Sense } from "./constants";
export { Constr } from "./constraint";
export {
    InvalidCoefficientError,
    InvalidLiteralError,
    InvalidOptionsError,
    InvalidSenseError,
    InvalidVariableTypeError,
    LengthMismatchError,
    ModelError,
    ModelMismatchError,
    TypeMismatchError,
} from "./errors";
export type { ModelErrorCode } from "./errors";
export { LinExpr, xsum } from "./expression";
export type { Operand, Term } from "./expression";
export { MemorySolver } from "./memory-solver";
export { Model } from "./model";
export type { SolverFactory } from "./model";
export type { ModelOptions, SolutionData, SolutionInput, VarOptions } from "./options";
export type { ConflictingAssignments, Literal, Solver } from "./solver";
export { Var } from "./variable";
