import type { Generation } from './cow';
import type { ListNode } from './node';

/**
 * Opaque cursor into a LinkedList.
 *
 * Holds its node and the identity token of the list state it was issued for
 * weakly, so it never keeps a list alive. `offset` equals the list count for
 * the past-the-end position.
 */
export class Position<T> {
    /** @internal */
    readonly $_owner: WeakRef<Generation>;
    /** @internal undefined for past-the-end */
    readonly $_node: WeakRef<ListNode<T>> | undefined;

    constructor(
        owner: Generation,
        node: ListNode<T> | undefined,
        readonly offset: number
    ) {
        this.$_owner = new WeakRef(owner);
        this.$_node = node && new WeakRef(node);
    }

    equals(other: Position<T>): boolean {
        return this.offset === other.offset;
    }
}

/**
 * Either an integer offset or a Position
 */
export type Location<T> = number | Position<T>;

export const comparePositions = <T>(a: Position<T>, b: Position<T>): number => a.offset - b.offset;
