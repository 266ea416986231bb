import type { Position } from '@/types';

/** Cell value for points that have not been sampled or whose sample was missed. */
export const NO_DATA = Number.NaN;

export interface MeasurementGridView {
    readonly size: number;
    get: (position: Position) => number;
    contains: (position: Position) => boolean;
    /** Copy of the cells, indexed `[y][x]`. */
    snapshot: () => number[][];
}

/**
 * Square sample map addressed by absolute stage position. Writes outside the
 * workspace are dropped without error.
 */
export class MeasurementGrid implements MeasurementGridView {
    public readonly size: number;

    private readonly cells: Float64Array;

    constructor(size: number) {
        if (!Number.isSafeInteger(size) || size <= 0) {
            throw new RangeError(`Grid size must be a positive integer, got ${size}`);
        }
        this.size = size;
        this.cells = new Float64Array(size * size).fill(NO_DATA);
    }

    public contains({ x, y }: Position): boolean {
        return (
            Number.isInteger(x) &&
            Number.isInteger(y) &&
            x >= 0 &&
            x < this.size &&
            y >= 0 &&
            y < this.size
        );
    }

    public get(position: Position): number {
        if (!this.contains(position)) {
            return NO_DATA;
        }
        return this.cells[position.y * this.size + position.x] ?? NO_DATA;
    }

    /** Returns whether the cell was inside the grid and written. */
    public write(position: Position, value: number): boolean {
        if (!this.contains(position)) {
            return false;
        }
        this.cells[position.y * this.size + position.x] = value;
        return true;
    }

    /**
     * Writes `value` over the `blockSize × blockSize` cells covered by one
     * sample, centered on `position` (for even sizes the extra row and column
     * fall on the negative side). Returns how many cells were inside the grid.
     */
    public writeBlock(position: Position, blockSize: number, value: number): number {
        if (blockSize <= 1) {
            return this.write(position, value) ? 1 : 0;
        }
        const start = -Math.floor(blockSize / 2);
        let written = 0;
        for (let dy = start; dy < start + blockSize; dy += 1) {
            for (let dx = start; dx < start + blockSize; dx += 1) {
                if (this.write({ x: position.x + dx, y: position.y + dy }, value)) {
                    written += 1;
                }
            }
        }
        return written;
    }

    public clear(): void {
        this.cells.fill(NO_DATA);
    }

    public snapshot(): number[][] {
        const rows: number[][] = [];
        for (let y = 0; y < this.size; y += 1) {
            rows.push(Array.from(this.cells.subarray(y * this.size, (y + 1) * this.size)));
        }
        return rows;
    }
}
