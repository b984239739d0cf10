/**
 * Chain node. Forward links (`n`) carry the chain from head to tail,
 * `p` is only used to walk backwards.
 */
export type ListNode<T> = {
    v: T; // value
    n: ListNode<T> | undefined; // next node
    p: ListNode<T> | undefined; // previous node
};

/**
 * Detached run of nodes: first node, last node and the number of nodes between them (inclusive)
 */
export type Chain<T> = [head: ListNode<T>, tail: ListNode<T>, count: number];

export const createNode = <T>(value: T): ListNode<T> => ({ v: value, n: undefined, p: undefined });

export function link<T>(before: ListNode<T>, after: ListNode<T>) {
    before.n = after;
    after.p = before;
}

/**
 * Copy every node reachable from `head`, relinking both directions in the copy
 */
export function cloneChain<T>(head: ListNode<T>): Chain<T> {
    const newHead = createNode(head.v);
    let newTail = newHead;
    let count = 1;
    for (let current = head.n; current; current = current.n) {
        const node = createNode(current.v);
        link(newTail, node);
        newTail = node;
        count++;
    }
    return [newHead, newTail, count];
}

/**
 * Build a detached chain from `values`, `undefined` when there are none
 */
export function buildChain<T>(values: Iterable<T>): Chain<T> | undefined {
    let head: ListNode<T> | undefined;
    let tail: ListNode<T> | undefined;
    let count = 0;
    for (const value of values) {
        const node = createNode(value);
        if (tail) {
            link(tail, node);
        } else {
            head = node;
        }
        tail = node;
        count++;
    }
    return head && tail ? [head, tail, count] : undefined;
}

/**
 * Walk to `offset` from whichever end is closer.
 * Returns `undefined` for offsets outside `[0, count)`.
 */
export function nodeAt<T>(head: ListNode<T> | undefined, tail: ListNode<T> | undefined, count: number, offset: number) {
    if (offset < 0 || offset >= count) {
        return undefined;
    }
    let current: ListNode<T> | undefined;
    if (offset < count >> 1) {
        current = head;
        for (let i = 0; i < offset; i++) {
            current = current?.n;
        }
    } else {
        current = tail;
        for (let i = count - 1; i > offset; i--) {
            current = current?.p;
        }
    }
    return current;
}
