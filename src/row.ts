/*-----------------------------------------------------------------------------
| Copyright (c) 2014, Nucleic Development Team.
|
| Distributed under the terms of the Modified BSD License.
|
| The full license is in the file COPYING.txt, distributed with this software.
|----------------------------------------------------------------------------*/

import { nearZero } from "./constants";

/**
 * A sparse row of the constraint matrix, keyed by variable index.
 * @private
 */
export class Row {
    /**
     * Construct a new Row.
     */
    constructor(public constant: number = 0.0 ) {}

    public get size(): number {
        return this.cells.size;
    }

    /**
     * Insert the variable into the row with the given coefficient.
     *
     * If the variable already exists in the row, the coefficient
     * will be added to the existing coefficient. If the resulting
     * coefficient is zero, the variable will be removed from the row.
     */
    public insert( idx: number, coefficient: number ): void {
        let value = ( this.cells.get( idx ) ?? 0.0 ) + coefficient;
        if ( nearZero( value ) ) {
            this.cells.delete( idx );
        } else {
            this.cells.set( idx, value );
        }
    }

    /**
     * Remove a variable from the row, returning its old coefficient.
     */
    public remove( idx: number ): number | undefined {
        let value = this.cells.get( idx );
        this.cells.delete( idx );
        return value;
    }

    /**
     * Returns the coefficient for the given variable.
     */
    public coefficientFor( idx: number ): number {
        return this.cells.get( idx ) ?? 0.0;
    }

    public entries(): IterableIterator<[number, number]> {
        return this.cells.entries();
    }

    private cells = new Map<number, number>();
}
