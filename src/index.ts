/**
 * Logical set operators for block-based time-series queries.
 *
 * @module series-logic
 */

export type { Tags, NodeID, Bounds, BlockMetadata, SeriesMeta, QueryLogger } from './query-types.js';
export { METRIC_NAME_TAG } from './query-types.js';
export type { Block, Builder, Step, StepIter } from './block/types.js';
export { ColumnBlock, ColumnBlockBuilder } from './block/column.js';
export { idWithKeys, idWithExcludes } from './models/tags.js';
export { Controller } from './executor/controller.js';
export type { ControllerOptions, OpNode } from './executor/controller.js';
export { VectorMatchCardinality, BaseNode, makeNode, opType, describeOp } from './logical/base.js';
export type { VectorMatching, Processor, MakeProcessor, BaseOp, BaseNodeOptions } from './logical/base.js';
export { hashFunc } from './logical/common.js';
export type { IdFunction } from './logical/common.js';
export { UNLESS_TYPE, UnlessNode, makeUnlessOp, makeUnlessNode, exclusion } from './logical/unless.js';
export {
    LogicalRegistry,
    createLogicalRegistry,
    registerLogicalOp,
    makeLogicalOp,
    logicalOpTypes,
} from './logical/registry.js';
export type { LogicalOpFactory } from './logical/registry.js';
export {
    QueryError,
    MismatchedStepCountsError,
    MismatchedBoundsError,
    ConflictingTagsError,
    UnknownOperatorError,
    UnknownNodeError,
    DuplicateBlockError,
    BuilderError,
    IteratorStateError,
    BlockClosedError,
} from './errors.js';
