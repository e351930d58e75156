import { Logger } from "winston";
import { ConcatPolicy, DEFAULT_CONFIG } from "../config/list-config";
import { getLogger } from "../logging/logging";
import { IndexOutOfRangeError } from "./errors";
import { List } from "./list";

export class ListNode<T> {
    constructor(
        public value: T,
        public next: ListNode<T> | null = null,
    ) {}
}

export type Equality<T> = (a: T, b: T) => boolean;

export type LinkedListOptions<T> = {
    equals?: Equality<T>; // Default: strict equality (===)
    concatPolicy?: ConcatPolicy; // Default: move
    logger?: Logger; // Default: the logger from getLogger(), if initialized
};

function strictEquals<T>(a: T, b: T): boolean {
    return a === b;
}

/**
 * Class representing a singly linked list.
 * Each node holds a value and a reference to the next node. The last node is cached as the tail, so appending is
 * O(1); every other positional operation walks forward from the head.
 */
export class LinkedList<T> implements List<T> {
    private head: ListNode<T> | null = null;
    private tail: ListNode<T> | null = null;
    private count: number = 0;

    private readonly equals: Equality<T>;
    private readonly concatPolicy: ConcatPolicy;
    private readonly logger: Logger | undefined;

    constructor(options: LinkedListOptions<T> = {}) {
        this.equals = options.equals ?? strictEquals;
        this.concatPolicy = options.concatPolicy ?? DEFAULT_CONFIG.concatPolicy;
        this.logger = options.logger ?? getLogger();
    }

    /**
     * Creates a linked list holding the given values in iteration order.
     */
    public static from<T>(values: Iterable<T>, options?: LinkedListOptions<T>): LinkedList<T> {
        const list = new LinkedList<T>(options);
        list.addAll(values);
        return list;
    }

    /**
     * The number of elements in the linked list.
     */
    public get length(): number {
        return this.count;
    }

    public size(): number {
        return this.count;
    }

    public isEmpty(): boolean {
        return this.count === 0;
    }

    /**
     * Appends a new element to the end of the linked list.
     */
    public add(value: T): void {
        const newNode = new ListNode(value);
        if (this.tail) {
            this.tail.next = newNode;
        } else {
            this.head = newNode; // First element is both head and tail
        }
        this.tail = newNode;
        this.count++;
    }

    /**
     * Adds a new element at the beginning of the linked list.
     */
    public addFirst(value: T): void {
        this.head = new ListNode(value, this.head);
        if (!this.tail) {
            this.tail = this.head;
        }
        this.count++;
    }

    /**
     * Appends all elements from the specified iterable to the linked list.
     */
    public addAll(values: Iterable<T>): void {
        for (const value of values) {
            this.add(value);
        }
    }

    /**
     * Inserts a new element before the element currently at `index`.
     * Only existing positions are accepted: inserting at `length` is rejected, appending is done with {@link add}.
     * @throws {IndexOutOfRangeError} If `index` is not in `[0, length)`.
     */
    public insert(index: number, value: T): void {
        this.checkIndex(index);

        if (index === 0) {
            this.head = new ListNode(value, this.head);
        } else {
            // index < length, so the predecessor always has a successor and the tail stays where it is.
            const previous = this.nodeAt(index - 1);
            previous.next = new ListNode(value, previous.next);
        }
        this.count++;
    }

    /**
     * Removes and returns the first element of the linked list.
     * @throws {IndexOutOfRangeError} If the list is empty.
     */
    public removeFirst(): T {
        return this.removeAt(0);
    }

    /**
     * Removes and returns the element at the specified index.
     * @throws {IndexOutOfRangeError} If `index` is not in `[0, length)`.
     */
    public removeAt(index: number): T {
        this.checkIndex(index);

        if (index === 0) {
            return this.unlinkHead(this.nodeAt(0));
        }

        const previous = this.nodeAt(index - 1);
        const removed = previous.next;
        if (!removed) {
            throw new IndexOutOfRangeError(index, this.count);
        }
        return this.unlinkAfter(previous, removed);
    }

    public contains(value: T): boolean {
        return this.indexOf(value) !== -1;
    }

    public indexOf(value: T): number {
        let current = this.head;
        for (let i = 0; current; i++) {
            if (this.equals(current.value, value)) {
                return i;
            }
            current = current.next;
        }
        return -1;
    }

    public clear(): void {
        this.head = null;
        this.tail = null;
        this.count = 0;
    }

    /**
     * Retrieves the element at the specified index. Reading the last element does not walk the list.
     * @throws {IndexOutOfRangeError} If `index` is not in `[0, length)`.
     */
    public get(index: number): T {
        this.checkIndex(index);

        if (index === this.count - 1 && this.tail) {
            return this.tail.value;
        }
        return this.nodeAt(index).value;
    }

    /**
     * Replaces the element at the specified index. Writing the last element does not walk the list.
     * @throws {IndexOutOfRangeError} If `index` is not in `[0, length)`.
     */
    public set(index: number, value: T): void {
        this.checkIndex(index);

        if (index === this.count - 1 && this.tail) {
            this.tail.value = value;
            return;
        }
        this.nodeAt(index).value = value;
    }

    /**
     * Appends the elements of `other` to this list and returns this list.
     *
     * With the `move` policy the nodes of `other` are relinked onto this list's tail and `other` is left empty, so
     * no node is ever reachable from two lists. With the `copy` policy the values of `other` are appended as new
     * nodes and `other` is left as it was. Concatenating a list with itself always copies.
     *
     * @param policy Overrides the policy the list was created with.
     */
    public concat(other: LinkedList<T>, policy: ConcatPolicy = this.concatPolicy): LinkedList<T> {
        if (other.isEmpty()) {
            return this;
        }

        if (policy === "copy" || other === this) {
            this.logger?.debug("Copying " + other.count + " element(s) onto a list of length " + this.count);
            // Snapshot first: when other is this list, appending would otherwise never reach the end.
            this.addAll(other.toArray());
            return this;
        }

        this.logger?.debug("Moving " + other.count + " node(s) onto a list of length " + this.count);
        if (this.tail) {
            this.tail.next = other.head;
        } else {
            this.head = other.head;
        }
        this.tail = other.tail;
        this.count += other.count;
        other.clear();
        return this;
    }

    /**
     * Removes the first element equal to `value`, if any, and returns this list. Later equal elements are kept.
     */
    public subtract(value: T): LinkedList<T> {
        const head = this.head;
        if (!head) {
            return this;
        }

        if (this.equals(head.value, value)) {
            this.unlinkHead(head);
            this.logger?.debug("Removed element at index 0");
            return this;
        }

        let current = head;
        for (let i = 1; current.next; i++) {
            if (this.equals(current.next.value, value)) {
                this.unlinkAfter(current, current.next);
                this.logger?.debug("Removed element at index " + i);
                return this;
            }
            current = current.next;
        }
        return this;
    }

    /**
     * Calls `action` for each element from head to tail.
     */
    public forEach(action: (value: T, index: number) => void): void {
        let current = this.head;
        for (let i = 0; current; i++) {
            action(current.value, i);
            current = current.next;
        }
    }

    /**
     * Returns a new linked list holding `transform` applied to each element. This list is not modified.
     */
    public map<S>(transform: (value: T, index: number) => S): LinkedList<S> {
        const transformedList = new LinkedList<S>({ concatPolicy: this.concatPolicy, logger: this.logger });
        this.forEach((value, index) => transformedList.add(transform(value, index)));
        return transformedList;
    }

    /**
     * Returns a new linked list holding the elements that pass `test`. This list is not modified.
     */
    public where(test: (value: T, index: number) => boolean): LinkedList<T> {
        const filteredList = new LinkedList<T>(this.options());
        this.forEach((value, index) => {
            if (test(value, index)) {
                filteredList.add(value);
            }
        });
        return filteredList;
    }

    /**
     * Creates a copy of the linked list. The elements themselves are shared, not cloned.
     */
    public clone(): LinkedList<T> {
        return LinkedList.from(this, this.options());
    }

    public toArray(): T[] {
        const values: T[] = [];
        this.forEach((value) => values.push(value));
        return values;
    }

    /**
     * Renders the list as `LinkedList: [v1,v2,...]`.
     */
    public toString(): string {
        return "LinkedList: [" + this.toArray().map(String).join(",") + "]";
    }

    /**
     * Makes the LinkedList class iterable, allowing the use of for...of loops.
     * @returns An iterator over the elements of the list.
     */
    [Symbol.iterator](): Iterator<T> {
        let current = this.head;

        return {
            next(): IteratorResult<T> {
                if (current) {
                    const value = current.value;
                    current = current.next;
                    return { value, done: false };
                } else {
                    return { value: undefined, done: true };
                }
            },
        };
    }

    private options(): LinkedListOptions<T> {
        return { equals: this.equals, concatPolicy: this.concatPolicy, logger: this.logger };
    }

    private checkIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.count) {
            this.logger?.debug("Rejecting index " + index + " for a list of length " + this.count);
            throw new IndexOutOfRangeError(index, this.count);
        }
    }

    /**
     * Walks `index` steps forward from the head. Callers validate the index first.
     */
    private nodeAt(index: number): ListNode<T> {
        let current = this.head;
        for (let i = 0; i < index && current; i++) {
            current = current.next;
        }
        if (!current) {
            throw new IndexOutOfRangeError(index, this.count);
        }
        return current;
    }

    private unlinkHead(head: ListNode<T>): T {
        this.head = head.next;
        if (!this.head) {
            this.tail = null; // List is now empty
        }
        this.count--;
        return head.value;
    }

    private unlinkAfter(previous: ListNode<T>, removed: ListNode<T>): T {
        previous.next = removed.next;
        if (removed === this.tail) {
            this.tail = previous;
        }
        this.count--;
        return removed.value;
    }
}
