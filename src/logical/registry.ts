import type { NodeID } from '../query-types.js';
import { UnknownOperatorError } from '../errors.js';
import type { BaseOp, VectorMatching } from './base.js';
import { UNLESS_TYPE, makeUnlessOp } from './unless.js';

export type LogicalOpFactory = (lNode: NodeID, rNode: NodeID, matching: VectorMatching) => BaseOp;

/**
 * Logical operators keyed by operator type.
 */
export class LogicalRegistry {
    private readonly factories = new Map<string, LogicalOpFactory>();

    register(operatorType: string, factory: LogicalOpFactory): void {
        this.factories.set(operatorType, factory);
    }

    has(operatorType: string): boolean {
        return this.factories.has(operatorType);
    }

    create(operatorType: string, lNode: NodeID, rNode: NodeID, matching: VectorMatching): BaseOp {
        const factory = this.factories.get(operatorType);
        if (!factory) throw new UnknownOperatorError(operatorType);
        return factory(lNode, rNode, matching);
    }

    types(): string[] {
        return Array.from(this.factories.keys()).sort();
    }
}

/** Registry with every built-in operator registered. */
export function createLogicalRegistry(): LogicalRegistry {
    const registry = new LogicalRegistry();
    registry.register(UNLESS_TYPE, makeUnlessOp);
    return registry;
}

const defaultRegistry = createLogicalRegistry();

export function registerLogicalOp(operatorType: string, factory: LogicalOpFactory): void {
    defaultRegistry.register(operatorType, factory);
}

export function makeLogicalOp(operatorType: string, lNode: NodeID, rNode: NodeID, matching: VectorMatching): BaseOp {
    return defaultRegistry.create(operatorType, lNode, rNode, matching);
}

export function logicalOpTypes(): string[] {
    return defaultRegistry.types();
}
