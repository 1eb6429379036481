export class QueryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'QueryError';
    }
}

export class MismatchedStepCountsError extends QueryError {
    constructor(message: string = 'block step counts are mismatched') {
        super(message);
        this.name = 'MismatchedStepCountsError';
    }
}

/** Reserved for a bounds check upstream of the logical operators. */
export class MismatchedBoundsError extends QueryError {
    constructor(message: string = 'block bounds are mismatched') {
        super(message);
        this.name = 'MismatchedBoundsError';
    }
}

/** Reserved for a tag validation step upstream of the logical operators. */
export class ConflictingTagsError extends QueryError {
    constructor(message: string = 'block tags conflict') {
        super(message);
        this.name = 'ConflictingTagsError';
    }
}

export class UnknownOperatorError extends QueryError {
    constructor(public readonly operatorType: string) {
        super(`unknown logical operator: ${operatorType}`);
        this.name = 'UnknownOperatorError';
    }
}

export class UnknownNodeError extends QueryError {
    constructor(public readonly nodeId: string) {
        super(`block received from unknown node: ${nodeId}`);
        this.name = 'UnknownNodeError';
    }
}

export class DuplicateBlockError extends QueryError {
    constructor(public readonly nodeId: string) {
        super(`node ${nodeId} sent a second block before its pair arrived`);
        this.name = 'DuplicateBlockError';
    }
}

export class BuilderError extends QueryError {
    constructor(message: string) {
        super(message);
        this.name = 'BuilderError';
    }
}

export class IteratorStateError extends QueryError {
    constructor(message: string) {
        super(message);
        this.name = 'IteratorStateError';
    }
}

export class BlockClosedError extends QueryError {
    constructor(message: string = 'block is closed') {
        super(message);
        this.name = 'BlockClosedError';
    }
}
