/**
 * Query Types - shared definitions for the execution pipeline
 *
 * Series are identified by unordered tag sets; blocks are aligned on a
 * fixed step grid described by their bounds.
 */

/** Tag key carrying the metric name. */
export const METRIC_NAME_TAG = '__name__';

/** Unordered tag key/value pairs. */
export type Tags = Readonly<Record<string, string>>;

/** Identifier the query planner assigns to a graph node. */
export type NodeID = string;

/**
 * Time bounds of a block. All values are epoch milliseconds.
 */
export interface Bounds {
    start: number;
    duration: number;
    stepSize: number;
}

export interface BlockMetadata {
    bounds: Bounds;
    /** Tags shared by every series in the block */
    tags: Tags;
}

export interface SeriesMeta {
    name: string;
    tags: Tags;
}

/**
 * Optional logger hook so src/ never writes to console.* directly.
 */
export type QueryLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};
