import { describe, it, expect } from 'vitest';
import { ForeignPositionError, LinkedList } from '../src';

describe('copy-on-write', () => {

    it('copies diverge on append and prepend', () => {
        const a = LinkedList.of(1, 2, 3);
        const b = a.copy();
        b.append(4);
        expect(a.toArray()).toEqual([1, 2, 3]);
        expect(b.toArray()).toEqual([1, 2, 3, 4]);
        a.prepend(0);
        expect(b.toArray()).toEqual([1, 2, 3, 4]);
        expect(a.toArray()).toEqual([0, 1, 2, 3]);
        expect(a.count).toBe(4);
        expect(b.count).toBe(4);
    });

    it('from shares a list', () => {
        const a = LinkedList.of(1, 2, 3);
        const b = LinkedList.from(a);
        expect(b).not.toBe(a);
        expect(b.toArray()).toEqual([1, 2, 3]);
        b.removeLast();
        expect(a.toArray()).toEqual([1, 2, 3]);
        expect(b.toArray()).toEqual([1, 2]);
    });

    it('value replacement on a copy', () => {
        const a = LinkedList.of(1, 2, 3);
        const b = a.copy();
        b.set(1, 20);
        b.swapAt(0, 2);
        expect(a.toArray()).toEqual([1, 2, 3]);
        expect(b.toArray()).toEqual([3, 20, 1]);
    });

    it('positional mutation on a copy', () => {
        const a = LinkedList.of(1, 2, 3, 4, 5);
        const b = a.copy();
        b.insert(9, 2);
        b.removeAt(0);
        b.replaceRange(3, 5, [7]);
        expect(a.toArray()).toEqual([1, 2, 3, 4, 5]);
        expect(b.toArray()).toEqual([2, 9, 3, 7]);
    });

    it('reverse on a copy', () => {
        const a = LinkedList.of(1, 2, 3);
        const b = a.copy();
        b.reverse();
        expect(a.toArray()).toEqual([1, 2, 3]);
        expect(a.reversed().toArray()).toEqual([3, 2, 1]);
        expect(b.toArray()).toEqual([3, 2, 1]);
    });

    it('removeAll on a copy', () => {
        const a = LinkedList.of(1, 2, 3);
        const b = a.copy();
        b.removeAll();
        expect(b.isEmpty).toBe(true);
        expect(a.toArray()).toEqual([1, 2, 3]);
        a.append(4);
        b.append(5);
        expect(a.toArray()).toEqual([1, 2, 3, 4]);
        expect(b.toArray()).toEqual([5]);
    });

    it('removeFirst / removeLast on a copy', () => {
        const a = LinkedList.of(1, 2, 3);
        const b = a.copy();
        expect(b.removeFirst()).toBe(1);
        expect(a.removeLast()).toBe(3);
        expect(a.toArray()).toEqual([1, 2]);
        expect(b.toArray()).toEqual([2, 3]);
    });

    it('empty copies diverge', () => {
        const a = new LinkedList<number>();
        const b = a.copy();
        a.append(1);
        b.append(2);
        expect(a.toArray()).toEqual([1]);
        expect(b.toArray()).toEqual([2]);
    });

    it('several copies', () => {
        const a = LinkedList.of(1, 2);
        const b = a.copy();
        const c = b.copy();
        c.append(3);
        b.prepend(0);
        expect(a.toArray()).toEqual([1, 2]);
        expect(b.toArray()).toEqual([0, 1, 2]);
        expect(c.toArray()).toEqual([1, 2, 3]);
    });

    it('a copy of a copy stays isolated after the source mutates', () => {
        const a = LinkedList.of('x');
        const b = a.copy();
        a.set(0, 'y');
        const c = b.copy();
        b.append('z');
        expect(a.toArray()).toEqual(['y']);
        expect(b.toArray()).toEqual(['x', 'z']);
        expect(c.toArray()).toEqual(['x']);
    });

    it('mutating a copy is not seen by an iterator of the original', () => {
        const a = LinkedList.of(1, 2, 3);
        const iterator = a[Symbol.iterator]();
        expect(iterator.next()).toEqual({ done: false, value: 1 });
        const b = a.copy();
        b.set(1, 20);
        b.removeLast();
        expect(iterator.next()).toEqual({ done: false, value: 2 });
        expect(iterator.next()).toEqual({ done: false, value: 3 });
        expect(iterator.next().done).toBe(true);
    });

    it('whole list replacement shares the replacement', () => {
        const a = LinkedList.of(1, 2);
        const b = LinkedList.of(3, 4);
        a.replaceRange(a.startPosition, a.endPosition, b);
        b.set(0, 30);
        expect(a.toArray()).toEqual([3, 4]);
        expect(b.toArray()).toEqual([30, 4]);
    });

    describe('positions', () => {
        it('are shared by copies until one of them clones', () => {
            const a = LinkedList.of(1, 2, 3);
            const position = a.positionAt(1);
            const b = a.copy();
            expect(b.at(position)).toBe(2);
            b.append(4);
            expect(a.at(position)).toBe(2);
            expect(() => b.at(position)).toThrow(ForeignPositionError);
        });

        it('go stale when the holder itself clones', () => {
            const a = LinkedList.of(1, 2, 3);
            const b = a.copy();
            const position = a.positionAt(1);
            a.set(position, 20);
            expect(a.toArray()).toEqual([1, 20, 3]);
            expect(b.toArray()).toEqual([1, 2, 3]);
            expect(() => a.at(position)).toThrow(ForeignPositionError);
        });

        it('survive value replacement on a sole holder', () => {
            const a = LinkedList.of(1, 2, 3);
            const position = a.positionAt(1);
            a.set(position, 5);
            a.swapAt(0, 2);
            expect(a.at(position)).toBe(5);
            expect(a.toArray()).toEqual([3, 5, 1]);
        });

        it('go stale after a structural change', () => {
            const a = LinkedList.of(1, 2, 3);
            const position = a.positionAt(1);
            a.append(4);
            expect(() => a.at(position)).toThrow(ForeignPositionError);
            expect(() => a.removeAt(position)).toThrow(ForeignPositionError);
            expect(a.toArray()).toEqual([1, 2, 3, 4]);
        });
    });
});
