/**
 * Logical operator plumbing shared by every binary set operator.
 *
 * An operator is described by an immutable BaseOp; the hosting graph turns it
 * into a BaseNode, which pairs the blocks arriving from the two upstream nodes
 * and runs the operator's Processor on each pair.
 */
import type { Block } from '../block/types.js';
import type { Controller, OpNode } from '../executor/controller.js';
import type { NodeID, QueryLogger } from '../query-types.js';
import { DuplicateBlockError, UnknownNodeError } from '../errors.js';

export enum VectorMatchCardinality {
    OneToOne,
    ManyToOne,
    OneToMany,
    ManyToMany,
}

/**
 * Which tags define series identity for a binary operation.
 */
export interface VectorMatching {
    card: VectorMatchCardinality;
    /** Labels to match on (`on`) or to ignore (`ignoring`) */
    matchingLabels: readonly string[];
    on: boolean;
    /** Extra labels carried from the "one" side in group matching */
    include: readonly string[];
}

export interface Processor {
    process(lhs: Block, rhs: Block): Block;
}

export type MakeProcessor = (op: BaseOp, controller: Controller) => Processor;

export interface BaseOp {
    readonly operatorType: string;
    readonly lNode: NodeID;
    readonly rNode: NodeID;
    readonly matching: Readonly<VectorMatching>;
    readonly processorFn: MakeProcessor;
}

export function opType(op: BaseOp): string {
    return op.operatorType;
}

export function describeOp(op: BaseOp): string {
    return `type: ${op.operatorType}, lhs: ${op.lNode}, rhs: ${op.rNode}`;
}

export type BaseNodeOptions = {
    logger?: QueryLogger | null;
};

/**
 * Graph transform for a binary logical operator.
 */
export class BaseNode implements OpNode {
    private readonly processor: Processor;
    private readonly options: Required<BaseNodeOptions>;
    private lhs: Block | null = null;
    private rhs: Block | null = null;

    constructor(
        private readonly op: BaseOp,
        private readonly controller: Controller,
        options: BaseNodeOptions = {}
    ) {
        const defaults: Required<BaseNodeOptions> = {
            logger: null,
        };
        this.options = { ...defaults, ...options };
        this.processor = op.processorFn(op, controller);
    }

    process(id: NodeID, block: Block): void {
        const logger = this.options.logger;
        if (id === this.op.lNode) {
            if (this.lhs) throw new DuplicateBlockError(id);
            this.lhs = block;
        } else if (id === this.op.rNode) {
            if (this.rhs) throw new DuplicateBlockError(id);
            this.rhs = block;
        } else {
            throw new UnknownNodeError(id);
        }

        if (!this.lhs || !this.rhs) {
            logger?.info?.(`[${this.op.operatorType}] holding block from ${id}, waiting for pair`);
            return;
        }

        const lhs = this.lhs;
        const rhs = this.rhs;
        this.lhs = null;
        this.rhs = null;

        let next: Block;
        try {
            next = this.processor.process(lhs, rhs);
        } catch (err) {
            logger?.error?.(`[${this.op.operatorType}] processing failed: ${err instanceof Error ? err.message : String(err)}`);
            throw err;
        }
        logger?.info?.(`[${this.op.operatorType}] emitting block for ${this.op.lNode}/${this.op.rNode}`);
        this.controller.process(next);
    }
}

export function makeNode(op: BaseOp, controller: Controller, options: BaseNodeOptions = {}): BaseNode {
    return new BaseNode(op, controller, options);
}
