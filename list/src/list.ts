import {
    createGeneration,
    createShare,
    isShared,
    joinShare,
    leaveShare,
    retainShare,
    type Generation,
    type Share,
} from './cow';
import { warnOnClone } from './debug';
import { EmptyListError, ForeignPositionError, OutOfRangeError } from './errors';
import { buildChain, cloneChain, createNode, link, nodeAt, type ListNode } from './node';
import { Position, type Location } from './position';

/**
 * Element shape required by the id-keyed helpers
 */
export interface Identifiable {
    readonly id: unknown;
}

function checkOffset(offset: number, limit: number) {
    if (!Number.isInteger(offset) || offset < 0 || offset >= limit) {
        throw new OutOfRangeError(offset, limit);
    }
}

function checkRange(lower: number, upper: number, count: number) {
    if (!Number.isInteger(lower) || !Number.isInteger(upper) || lower < 0 || lower > upper || upper > count) {
        // an empty range names a single insertion point
        throw lower === upper ? new OutOfRangeError(lower, count + 1) : new OutOfRangeError(lower, count, upper);
    }
}

/**
 * Doubly-linked list with value semantics.
 *
 * `copy()` is O(1): both handles share one chain until either of them mutates,
 * at which point the mutating handle clones the chain for itself.
 *
 * ```ts
 * const a = LinkedList.of(1, 2, 3);
 * const b = a.copy();
 * b.append(4);
 * a.toArray(); // [1, 2, 3]
 * b.toArray(); // [1, 2, 3, 4]
 * ```
 */
export class LinkedList<T> implements Iterable<T> {
    private head: ListNode<T> | undefined;
    private tail: ListNode<T> | undefined;
    private size = 0;
    private generation: Generation = createGeneration();
    private share: Share = createShare();

    constructor(values?: Iterable<T>) {
        joinShare(this, this.share);
        const chain = values && buildChain(values);
        if (chain) {
            [this.head, this.tail, this.size] = chain;
        }
    }

    /**
     * Shares the chain of another LinkedList, copies any other iterable
     */
    static from<T>(values: Iterable<T>): LinkedList<T> {
        return values instanceof LinkedList ? values.copy() : new LinkedList(values);
    }

    static of<T>(...values: T[]): LinkedList<T> {
        return new LinkedList(values);
    }

    /**
     * O(1) logical copy
     */
    copy(): LinkedList<T> {
        const copy = new LinkedList<T>();
        copy.adopt(this);
        return copy;
    }

    get count(): number {
        return this.size;
    }

    get isEmpty(): boolean {
        return this.size === 0;
    }

    get first(): T | undefined {
        return this.head?.v;
    }

    get last(): T | undefined {
        return this.tail?.v;
    }

    private adopt(source: LinkedList<T>) {
        if (source === this) {
            return;
        }
        leaveShare(this, this.share);
        this.head = source.head;
        this.tail = source.tail;
        this.size = source.size;
        this.generation = source.generation;
        this.share = source.share;
        retainShare(this, this.share);
    }

    private detachShare() {
        leaveShare(this, this.share);
        this.share = createShare();
        joinShare(this, this.share);
    }

    /**
     * Make this handle the sole holder of its chain.
     * Returns true when the chain was cloned: nodes captured before the call now belong to another list.
     */
    private ensureUnique(): boolean {
        if (!isShared(this.share)) {
            return false;
        }
        this.detachShare();
        if (!this.head) {
            return false;
        }
        [this.head, this.tail] = cloneChain(this.head);
        this.generation = createGeneration();
        warnOnClone(this.size);
        return true;
    }

    /**
     * Start a new generation: every position issued so far becomes foreign
     */
    private renew() {
        this.generation = createGeneration();
    }

    private offsetOf(location: Location<T>): number {
        if (typeof location === 'number') {
            return location;
        }
        if (location.$_owner.deref() !== this.generation) {
            throw new ForeignPositionError();
        }
        return location.offset;
    }

    private offsetIn(location: Location<T>, limit: number): number {
        const offset = this.offsetOf(location);
        checkOffset(offset, limit);
        return offset;
    }

    /**
     * Node at an already checked offset; a position answers directly unless the chain was cloned since it was validated
     */
    private nodeFor(location: Location<T>, offset: number, cloned = false): ListNode<T> | undefined {
        return (
            (!cloned && typeof location !== 'number' && location.$_node?.deref()) ||
            nodeAt(this.head, this.tail, this.size, offset)
        );
    }

    private requireNode(location: Location<T>, offset: number, cloned = false): ListNode<T> {
        const node = this.nodeFor(location, offset, cloned);
        if (!node) {
            throw new OutOfRangeError(offset, this.size);
        }
        return node;
    }

    private unlink(node: ListNode<T>) {
        const { p, n } = node;
        if (p) {
            p.n = n;
        } else {
            this.head = n;
        }
        if (n) {
            n.p = p;
        } else {
            this.tail = p;
        }
        this.size--;
    }

    get startPosition(): Position<T> {
        return new Position(this.generation, this.head, 0);
    }

    get endPosition(): Position<T> {
        return new Position(this.generation, undefined, this.size);
    }

    positionAt(offset: number): Position<T> {
        checkOffset(offset, this.size + 1);
        return new Position(this.generation, nodeAt(this.head, this.tail, this.size, offset), offset);
    }

    positionAfter(position: Position<T>): Position<T> {
        const offset = this.offsetIn(position, this.size);
        return new Position(this.generation, this.requireNode(position, offset).n, offset + 1);
    }

    positionBefore(position: Position<T>): Position<T> {
        const offset = this.offsetIn(position, this.size + 1);
        if (offset === 0) {
            throw new OutOfRangeError(-1, this.size + 1);
        }
        const node = offset === this.size ? this.tail : this.requireNode(position, offset).p;
        return new Position(this.generation, node, offset - 1);
    }

    at(location: Location<T>): T {
        const offset = this.offsetIn(location, this.size);
        return this.requireNode(location, offset).v;
    }

    /**
     * Same as `at` but answers `undefined` instead of throwing for offsets outside the list
     */
    get(offset: number): T | undefined {
        return Number.isInteger(offset) ? nodeAt(this.head, this.tail, this.size, offset)?.v : undefined;
    }

    set(location: Location<T>, value: T): void {
        const offset = this.offsetIn(location, this.size);
        this.requireNode(location, offset, this.ensureUnique()).v = value;
    }

    swapAt(i: Location<T>, j: Location<T>): void {
        const a = this.offsetIn(i, this.size);
        const b = this.offsetIn(j, this.size);
        if (a === b) {
            return;
        }
        const cloned = this.ensureUnique();
        const first = this.requireNode(i, a, cloned);
        const second = this.requireNode(j, b, cloned);
        [first.v, second.v] = [second.v, first.v];
    }

    /**
     * New list holding the elements in `[start, end)`
     */
    slice(start: Location<T>, end: Location<T>): LinkedList<T> {
        const lower = this.offsetOf(start);
        const upper = this.offsetOf(end);
        checkRange(lower, upper, this.size);
        const result = new LinkedList<T>();
        let current = lower < upper ? this.nodeFor(start, lower) : undefined;
        for (let i = lower; i < upper && current; i++) {
            result.append(current.v);
            current = current.n;
        }
        return result;
    }

    append(value: T): void {
        this.ensureUnique();
        const node = createNode(value);
        if (this.tail) {
            link(this.tail, node);
        } else {
            this.head = node;
        }
        this.tail = node;
        this.size++;
        this.renew();
    }

    appendAll(values: Iterable<T>): void {
        this.replaceRange(this.size, this.size, values);
    }

    prepend(value: T): void {
        this.ensureUnique();
        const node = createNode(value);
        if (this.head) {
            link(node, this.head);
        } else {
            this.tail = node;
        }
        this.head = node;
        this.size++;
        this.renew();
    }

    prependAll(values: Iterable<T>): void {
        this.replaceRange(0, 0, values);
    }

    removeFirst(): T {
        if (!this.head) {
            throw new EmptyListError('removeFirst');
        }
        this.ensureUnique();
        const { v } = this.head;
        this.unlink(this.head);
        this.renew();
        return v;
    }

    removeLast(): T {
        if (!this.tail) {
            throw new EmptyListError('removeLast');
        }
        this.ensureUnique();
        const { v } = this.tail;
        this.unlink(this.tail);
        this.renew();
        return v;
    }

    popFirst(): T | undefined {
        return this.head ? this.removeFirst() : undefined;
    }

    popLast(): T | undefined {
        return this.tail ? this.removeLast() : undefined;
    }

    /**
     * Drops this handle's chain without touching nodes a copy may still hold
     */
    removeAll(): void {
        this.detachShare();
        this.head = this.tail = undefined;
        this.size = 0;
        this.renew();
    }

    insert(value: T, at: Location<T>): void {
        this.replaceRange(at, at, [value]);
    }

    insertAll(values: Iterable<T>, at: Location<T>): void {
        this.replaceRange(at, at, values);
    }

    removeAt(location: Location<T>): T {
        const offset = this.offsetIn(location, this.size);
        const node = this.requireNode(location, offset, this.ensureUnique());
        this.unlink(node);
        this.renew();
        return node.v;
    }

    removeRange(start: Location<T>, end: Location<T>): void {
        this.replaceRange(start, end, []);
    }

    /**
     * Replace the elements in `[start, end)` with `values`.
     * An empty `values` deletes the range, an empty range inserts before `start`.
     */
    replaceRange(start: Location<T>, end: Location<T>, values: Iterable<T>): void {
        const lower = this.offsetOf(start);
        const upper = this.offsetOf(end);
        checkRange(lower, upper, this.size);

        if (lower === 0 && upper === this.size && values instanceof LinkedList) {
            this.adopt(values);
            return;
        }

        // materialize first: a throwing or self-referencing source must see the list unchanged
        const chain = buildChain(values);
        if (!chain && lower === upper) {
            return;
        }

        const cloned = this.ensureUnique();
        const after = this.nodeFor(end, upper, cloned);
        const before = lower === upper ? (after ? after.p : this.tail) : this.nodeFor(start, lower, cloned)?.p;

        if (chain) {
            const [first, last] = chain;
            if (before) {
                link(before, first);
            } else {
                this.head = first;
            }
            if (after) {
                link(last, after);
            } else {
                this.tail = last;
            }
        } else {
            if (before) {
                before.n = after;
            } else {
                this.head = after;
            }
            if (after) {
                after.p = before;
            } else {
                this.tail = before;
            }
        }

        this.size += (chain ? chain[2] : 0) - (upper - lower);
        this.renew();
    }

    reverse(): void {
        this.ensureUnique();
        let current = this.head;
        while (current) {
            const next = current.n;
            current.n = current.p;
            current.p = next;
            current = next;
        }
        [this.head, this.tail] = [this.tail, this.head];
        this.renew();
    }

    reversed(): LinkedList<T> {
        const result = new LinkedList<T>();
        for (let node = this.tail; node; node = node.p) {
            result.append(node.v);
        }
        return result;
    }

    [Symbol.iterator](): Iterator<T> {
        let current = this.head;
        // a running iterator keeps its handle, and so its share slot, alive
        let holder: LinkedList<T> | undefined = this;
        return {
            next: () => {
                if (!current || !holder) {
                    holder = undefined;
                    return { done: true, value: undefined };
                }
                const value = current.v;
                current = current.n;
                return { done: false, value };
            }
        };
    }

    toArray(): T[] {
        return Array.from(this);
    }

    map<U>(transform: (value: T) => U): LinkedList<U> {
        const result = new LinkedList<U>();
        for (let node = this.head; node; node = node.n) {
            result.append(transform(node.v));
        }
        return result;
    }

    filter<S extends T>(predicate: (value: T) => value is S): LinkedList<S>;
    filter(predicate: (value: T) => boolean): LinkedList<T>;
    filter(predicate: (value: T) => boolean): LinkedList<T> {
        const result = new LinkedList<T>();
        for (let node = this.head; node; node = node.n) {
            if (predicate(node.v)) {
                result.append(node.v);
            }
        }
        return result;
    }

    /**
     * Map and drop `null`/`undefined` results
     */
    compactMap<U>(transform: (value: T) => U | null | undefined): LinkedList<U> {
        const result = new LinkedList<U>();
        for (let node = this.head; node; node = node.n) {
            const mapped = transform(node.v);
            if (mapped !== null && mapped !== undefined) {
                result.append(mapped);
            }
        }
        return result;
    }

    reduce<R>(initial: R, reducer: (accumulator: R, value: T) => R): R {
        let accumulator = initial;
        for (let node = this.head; node; node = node.n) {
            accumulator = reducer(accumulator, node.v);
        }
        return accumulator;
    }

    private seekId<E extends Identifiable>(this: LinkedList<E>, id: unknown): [node: ListNode<E>, offset: number] | undefined {
        let offset = 0;
        for (let node = this.head; node; node = node.n, offset++) {
            if (node.v.id === id) {
                return [node, offset];
            }
        }
        return undefined;
    }

    firstById<E extends T & Identifiable>(this: LinkedList<E>, id: E['id']): E | undefined {
        return this.seekId(id)?.[0].v;
    }

    allById<E extends T & Identifiable>(this: LinkedList<E>, id: E['id']): E[] {
        const matches: E[] = [];
        for (let node = this.head; node; node = node.n) {
            if (node.v.id === id) {
                matches.push(node.v);
            }
        }
        return matches;
    }

    containsId<E extends T & Identifiable>(this: LinkedList<E>, id: E['id']): boolean {
        return this.seekId(id) !== undefined;
    }

    removeFirstById<E extends T & Identifiable>(this: LinkedList<E>, id: E['id']): E | undefined {
        const found = this.seekId(id);
        if (!found) {
            return undefined;
        }
        const [match, offset] = found;
        const node = this.ensureUnique() ? this.requireNode(offset, offset) : match;
        this.unlink(node);
        this.renew();
        return node.v;
    }

    /**
     * Unlink every element with `id`, answering them in list order
     */
    removeAllById<E extends T & Identifiable>(this: LinkedList<E>, id: E['id']): E[] {
        const found = this.seekId(id);
        if (!found) {
            return [];
        }
        const [match, offset] = found;
        const removed: E[] = [];
        let current: ListNode<E> | undefined = this.ensureUnique() ? this.requireNode(offset, offset) : match;
        while (current) {
            const next: ListNode<E> | undefined = current.n;
            if (current.v.id === id) {
                removed.push(current.v);
                this.unlink(current);
            }
            current = next;
        }
        this.renew();
        return removed;
    }

    /**
     * Replace the first element with `id` by `transform(element)`; false when there is none
     */
    updateFirstById<E extends T & Identifiable>(this: LinkedList<E>, id: E['id'], transform: (value: E) => E): boolean {
        const found = this.seekId(id);
        if (!found) {
            return false;
        }
        const [match, offset] = found;
        const value = transform(match.v);
        (this.ensureUnique() ? this.requireNode(offset, offset) : match).v = value;
        return true;
    }

    filteredByIds<E extends T & Identifiable>(this: LinkedList<E>, ids: Iterable<E['id']>): LinkedList<E> {
        const wanted = new Set(ids);
        return this.filter(value => wanted.has(value.id));
    }

    /**
     * Later elements overwrite earlier ones with the same id
     */
    indexedById<E extends T & Identifiable>(this: LinkedList<E>): Map<E['id'], E> {
        const index = new Map<E['id'], E>();
        for (let node = this.head; node; node = node.n) {
            index.set(node.v.id, node.v);
        }
        return index;
    }

    groupedById<E extends T & Identifiable>(this: LinkedList<E>): Map<E['id'], E[]> {
        const groups = new Map<E['id'], E[]>();
        for (let node = this.head; node; node = node.n) {
            const group = groups.get(node.v.id);
            if (group) {
                group.push(node.v);
            } else {
                groups.set(node.v.id, [node.v]);
            }
        }
        return groups;
    }

    equals(other: LinkedList<T>, isEqual: (a: T, b: T) => boolean = Object.is): boolean {
        if (this.size !== other.size) {
            return false;
        }
        let a = this.head;
        let b = other.head;
        while (a && b) {
            if (a === b) {
                // rest of the chain is shared
                return true;
            }
            if (!isEqual(a.v, b.v)) {
                return false;
            }
            a = a.n;
            b = b.n;
        }
        return true;
    }

    hashCode(hashElement: (value: T) => number): number {
        let hash = this.size | 0;
        for (let node = this.head; node; node = node.n) {
            hash = (Math.imul(hash, 31) + hashElement(node.v)) | 0;
        }
        return hash;
    }

    toJSON(): T[] {
        return this.toArray();
    }

    toString(): string {
        return `LinkedList(${this.toArray().map(String).join(', ')})`;
    }

    debugDescription(): string {
        if (this.size === 0) {
            return 'LinkedList(empty)';
        }
        return `LinkedList(count: ${this.size}) {\n  ${this.toArray().map(String).join('\n  ')}\n}`;
    }
}
