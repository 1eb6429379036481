import type { Block, Builder } from '../block/types.js';
import { ColumnBlockBuilder } from '../block/column.js';
import type { BlockMetadata, NodeID, QueryLogger, SeriesMeta } from '../query-types.js';

/**
 * A transform downstream of a controller. `id` is the node that produced the block.
 */
export interface OpNode {
    process(id: NodeID, block: Block): void;
}

export type ControllerOptions = {
    logger?: QueryLogger | null;
};

/**
 * Supplies block builders to a transform and forwards its output blocks to
 * every downstream transform.
 */
export class Controller {
    private readonly transforms: OpNode[] = [];
    private readonly options: Required<ControllerOptions>;

    constructor(public readonly id: NodeID, options: ControllerOptions = {}) {
        const defaults: Required<ControllerOptions> = {
            logger: null,
        };
        this.options = { ...defaults, ...options };
    }

    addTransform(node: OpNode): void {
        this.transforms.push(node);
    }

    /**
     * Hands a finished block to each downstream transform, tagged with this controller's node id.
     */
    process(block: Block): void {
        if (this.transforms.length === 0) {
            this.options.logger?.warn?.(`[controller ${this.id}] no downstream transforms, block dropped`);
            return;
        }
        for (const t of this.transforms) {
            t.process(this.id, block);
        }
    }

    blockBuilder(meta: BlockMetadata, seriesMeta: readonly SeriesMeta[]): Builder {
        return new ColumnBlockBuilder(meta, seriesMeta);
    }
}
