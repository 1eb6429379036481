import type { BlockMetadata, SeriesMeta } from '../query-types.js';

/**
 * One aligned time slice across every series of a block.
 */
export interface Step {
    /** Epoch milliseconds of this step */
    time(): number;
    /** Values aligned 1:1 with the iterator's seriesMeta() order */
    values(): readonly number[];
}

/**
 * Forward-only cursor over a block's time axis.
 */
export interface StepIter {
    /** Advance; false once exhausted. */
    next(): boolean;
    /** Step at the cursor. Throws if retrieval fails. */
    current(): Step;
    stepCount(): number;
    seriesMeta(): readonly SeriesMeta[];
    meta(): BlockMetadata;
}

export interface Block {
    /** Throws if the iterator cannot be opened. */
    stepIter(): StepIter;
    close(): void;
}

/**
 * Write-only accumulator for a new block.
 */
export interface Builder {
    /** Allocate `count` time columns. Throws on failure. */
    addCols(count: number): void;
    /** Append a value to column `col`; successive appends fill successive series positions. */
    appendValue(col: number, value: number): void;
    build(): Block;
}
