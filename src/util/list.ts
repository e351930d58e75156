/**
 * Interface representing a generic, index-addressable List.
 */
export interface List<T> extends Iterable<T> {
    /**
     * The number of elements in the list.
     */
    readonly length: number;

    /**
     * Adds an element to the list at the end.
     * @param value The element to add.
     */
    add(value: T): void;

    /**
     * Adds an element at the beginning of the list.
     * @param value The element to add.
     */
    addFirst(value: T): void;

    /**
     * Adds all elements from the specified iterable to the end of the list.
     * @param values The values to add.
     */
    addAll(values: Iterable<T>): void;

    /**
     * Inserts an element before the specified index. The index must refer to an existing element; use `add` to
     * append.
     * @param index The position at which to insert the element.
     * @param value The element to insert.
     */
    insert(index: number, value: T): void;

    /**
     * Removes and returns the first element of the list.
     */
    removeFirst(): T;

    /**
     * Removes the element at the specified index.
     * @param index The index of the element to remove.
     * @returns The removed element.
     */
    removeAt(index: number): T;

    /**
     * Retrieves the element at the specified index.
     * @param index The index of the element to retrieve.
     */
    get(index: number): T;

    /**
     * Replaces the element at the specified index.
     * @param index The index of the element to replace.
     * @param value The new element.
     */
    set(index: number, value: T): void;

    /**
     * Checks if the list holds an element equal to `value`.
     */
    contains(value: T): boolean;

    /**
     * Returns the position of the first element equal to `value`, or -1 if there is none.
     */
    indexOf(value: T): number;

    /**
     * Removes every element.
     */
    clear(): void;

    /**
     * Returns the number of elements in the list.
     */
    size(): number;

    /**
     * Checks if the list is empty.
     * @returns `true` if the list is empty, `false` otherwise.
     */
    isEmpty(): boolean;

    /**
     * Calls `action` for each element, first to last.
     */
    forEach(action: (value: T, index: number) => void): void;

    /**
     * Creates a list holding the result of `transform` for each element, in order.
     */
    map<S>(transform: (value: T, index: number) => S): List<S>;

    /**
     * Creates a list holding only the elements that pass `test`, in order.
     */
    where(test: (value: T, index: number) => boolean): List<T>;

    /**
     * Creates a copy of the list.
     * @returns A new list instance containing the same elements.
     */
    clone(): List<T>;

    /**
     * Copies the elements into an array, first to last.
     */
    toArray(): T[];
}
