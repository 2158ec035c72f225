/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import { z } from "zod";

import { Column } from "./column";
import { INF, ObjectiveSense, OptimizationStatus, VarType } from "./constants";
import { InvalidOptionsError } from "./errors";

export const ModelOptionsSchema = z.object( {
    name: z.string().default( "" ),
    sense: z.nativeEnum( ObjectiveSense ).default( ObjectiveSense.Minimize ),
} );

export type ModelOptions = z.input<typeof ModelOptionsSchema>;

// Bounds may be infinite, coefficients may not.
export const BoundSchema = z.number().refine( value => !Number.isNaN( value ), "bound must be a number" );
export const ObjSchema = z.number().finite();

const BOUNDS_ISSUE = "lb: lower bound must not exceed upper bound";

export const VarOptionsSchema = z
    .object( {
        name: z.string().optional(),
        lb: BoundSchema.default( 0.0 ),
        ub: BoundSchema.default( INF ),
        obj: ObjSchema.default( 0.0 ),
        varType: z.nativeEnum( VarType ).default( VarType.Continuous ),
        column: z.instanceof( Column ).optional(),
    } )
    .refine( data => data.lb <= data.ub, {
        message: "lower bound must not exceed upper bound",
        path: [ "lb" ],
    } );

/**
 * Fail unless `lb <= ub`, reporting the issue the way VarOptionsSchema does.
 */
export function checkBounds( lb: number, ub: number, what: string ): void {
    if ( !( lb <= ub ) ) {
        throw new InvalidOptionsError( `invalid ${ what }: ${ BOUNDS_ISSUE }`, [ BOUNDS_ISSUE ] );
    }
}

export type VarOptions = z.input<typeof VarOptionsSchema>;

/**
 * Result of an optimization run, as handed to `MemorySolver.loadSolution`.
 */
export const SolutionDataSchema = z.object( {
    status: z.nativeEnum( OptimizationStatus ),
    objectiveValue: z.number().optional(),
    x: z.array( z.number() ).default( [] ),
    pool: z.array( z.array( z.number() ) ).optional(),
    rc: z.array( z.number() ).optional(),
    pi: z.array( z.number() ).optional(),
} );

export type SolutionData = z.output<typeof SolutionDataSchema>;
export type SolutionInput = z.input<typeof SolutionDataSchema>;

/**
 * Parse options against a schema, raising InvalidOptionsError on failure.
 */
export function parseOptions<T extends z.ZodTypeAny>( schema: T, input: unknown, what: string ): z.output<T> {
    let result = schema.safeParse( input );
    if ( !result.success ) {
        let issues = result.error.issues.map(
            issue => ( issue.path.length > 0 ? issue.path.join( "." ) + ": " : "" ) + issue.message,
        );
        throw new InvalidOptionsError( `invalid ${ what }: ${ issues.join( "; " ) }`, issues );
    }
    return result.data;
}
