/**
 * Offset or range outside the bounds the operation allows.
 * `limit` is exclusive for offsets and inclusive (the list count) for ranges.
 */
export class OutOfRangeError extends RangeError {
    constructor(
        readonly offset: number,
        readonly limit: number,
        readonly end?: number
    ) {
        super(
            end === undefined
                ? `Offset ${offset} is not within 0..<${limit}`
                : `Range ${offset}..<${end} is not within 0...${limit}`
        );
        this.name = 'OutOfRangeError';
    }
}

export class EmptyListError extends Error {
    constructor(readonly operation: string) {
        super(`Cannot ${operation} on an empty list`);
        this.name = 'EmptyListError';
    }
}

/**
 * Position issued by another list, or by this list before its last clone or structural change
 */
export class ForeignPositionError extends Error {
    constructor() {
        super('Position does not belong to the current state of this list');
        this.name = 'ForeignPositionError';
    }
}
