/**
 * Column Block
 *
 * In-memory block storing one column of values per time step. This is the
 * builder the controller hands out to transforms.
 */
import type { BlockMetadata, SeriesMeta } from '../query-types.js';
import type { Block, Builder, Step, StepIter } from './types.js';
import { BlockClosedError, BuilderError, IteratorStateError } from '../errors.js';

class ColumnStep implements Step {
    constructor(private readonly ts: number, private readonly vals: readonly number[]) { }

    time(): number {
        return this.ts;
    }

    values(): readonly number[] {
        return this.vals;
    }
}

class ColumnBlockStepIter implements StepIter {
    private idx = -1;

    constructor(
        private readonly columns: readonly (readonly number[])[],
        private readonly blockMeta: BlockMetadata,
        private readonly series: readonly SeriesMeta[]
    ) { }

    next(): boolean {
        if (this.idx >= this.columns.length) return false;
        this.idx++;
        return this.idx < this.columns.length;
    }

    current(): Step {
        if (this.idx < 0 || this.idx >= this.columns.length) {
            throw new IteratorStateError(`step iterator has no current step (index ${this.idx})`);
        }
        const { start, stepSize } = this.blockMeta.bounds;
        return new ColumnStep(start + this.idx * stepSize, this.columns[this.idx]);
    }

    stepCount(): number {
        return this.columns.length;
    }

    seriesMeta(): readonly SeriesMeta[] {
        return this.series;
    }

    meta(): BlockMetadata {
        return this.blockMeta;
    }
}

export class ColumnBlock implements Block {
    private readonly columns: readonly (readonly number[])[];
    private readonly series: readonly SeriesMeta[];
    private closed = false;

    constructor(
        columns: readonly (readonly number[])[],
        private readonly blockMeta: BlockMetadata,
        series: readonly SeriesMeta[]
    ) {
        this.columns = columns.map((col) => Object.freeze([...col]));
        this.series = Object.freeze([...series]);
    }

    stepIter(): StepIter {
        if (this.closed) throw new BlockClosedError();
        return new ColumnBlockStepIter(this.columns, this.blockMeta, this.series);
    }

    close(): void {
        this.closed = true;
    }
}

export class ColumnBlockBuilder implements Builder {
    private readonly columns: number[][] = [];
    private built = false;

    constructor(
        private readonly blockMeta: BlockMetadata,
        private readonly series: readonly SeriesMeta[]
    ) { }

    addCols(count: number): void {
        if (this.built) throw new BuilderError('builder already built');
        if (!Number.isInteger(count) || count < 0) {
            throw new BuilderError(`invalid column count: ${count}`);
        }
        for (let i = 0; i < count; i++) {
            this.columns.push([]);
        }
    }

    appendValue(col: number, value: number): void {
        if (this.built) throw new BuilderError('builder already built');
        if (col < 0 || col >= this.columns.length) {
            throw new BuilderError(`column ${col} out of range (have ${this.columns.length})`);
        }
        const column = this.columns[col];
        if (column.length >= this.series.length) {
            throw new BuilderError(`column ${col} already holds ${this.series.length} values`);
        }
        column.push(value);
    }

    build(): Block {
        if (this.built) throw new BuilderError('builder already built');
        this.built = true;
        return new ColumnBlock(this.columns, this.blockMeta, this.series);
    }
}
