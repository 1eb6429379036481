import type { Block, Builder, StepIter } from '../block/types.js';
import type { Controller } from '../executor/controller.js';
import type { NodeID, SeriesMeta } from '../query-types.js';
import { MismatchedStepCountsError } from '../errors.js';
import type { BaseOp, Processor, VectorMatching } from './base.js';
import { hashFunc, type IdFunction } from './common.js';

/** Keeps every series on the lhs that has no match on the rhs. */
export const UNLESS_TYPE = 'unless';

const EXCLUDED = -1;

export function makeUnlessOp(lNode: NodeID, rNode: NodeID, matching: VectorMatching): BaseOp {
    return Object.freeze({
        operatorType: UNLESS_TYPE,
        lNode,
        rNode,
        matching: Object.freeze({
            ...matching,
            matchingLabels: Object.freeze([...matching.matchingLabels]),
            include: Object.freeze([...matching.include]),
        }),
        processorFn: makeUnlessNode,
    });
}

export function makeUnlessNode(op: BaseOp, controller: Controller): Processor {
    return new UnlessNode(op, controller);
}

/**
 * Indices of lhs series whose signature does not appear on the rhs, ascending.
 *
 * Left series sharing a signature collapse to the last one seen.
 */
export function exclusion(lhs: readonly SeriesMeta[], rhs: readonly SeriesMeta[], idFunction: IdFunction): number[] {
    const leftSigs = new Map<bigint, number>();
    lhs.forEach((meta, idx) => {
        leftSigs.set(idFunction(meta.tags), idx);
    });

    for (const rs of rhs) {
        const id = idFunction(rs.tags);
        if (leftSigs.has(id)) {
            leftSigs.set(id, EXCLUDED);
        }
    }

    const uniqueLeft: number[] = [];
    for (const v of leftSigs.values()) {
        if (v !== EXCLUDED) uniqueLeft.push(v);
    }
    // Map order is insertion order of the first occurrence, not index order.
    return uniqueLeft.sort((a, b) => a - b);
}

function addValuesAtIndices(indices: readonly number[], iter: StepIter, builder: Builder): void {
    for (let col = 0; iter.next(); col++) {
        const values = iter.current().values();
        for (const idx of indices) {
            builder.appendValue(col, values[idx]);
        }
    }
}

export class UnlessNode implements Processor {
    private readonly idFunction: IdFunction;

    constructor(op: BaseOp, private readonly controller: Controller) {
        this.idFunction = hashFunc(op.matching.on, ...op.matching.matchingLabels);
    }

    process(lhs: Block, rhs: Block): Block {
        const lIter = lhs.stepIter();
        const rIter = rhs.stepIter();

        if (lIter.stepCount() !== rIter.stepCount()) {
            throw new MismatchedStepCountsError();
        }

        const lSeriesMeta = lIter.seriesMeta();
        const lIds = exclusion(lSeriesMeta, rIter.seriesMeta(), this.idFunction);
        const takenMeta = lIds.map((idx) => lSeriesMeta[idx]);

        const builder = this.controller.blockBuilder(lIter.meta(), takenMeta);
        builder.addCols(lIter.stepCount());
        addValuesAtIndices(lIds, lIter, builder);

        return builder.build();
    }
}
