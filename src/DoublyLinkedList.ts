import {ListIndexError} from './exception'
import {expectNode} from './util'

/** @internal */
export interface Node<T> {
  value: T
  prev: null|Node<T>
  next: null|Node<T>
}

/**
 * Doubly linked sequence with constant time insertion and removal at both
 * ends.
 * ```
 * L.........R
 * head...tail
 * ```
 *
 * Nodes never leave the list; callers only see values. Not safe to mutate
 * while an iterator from {@link values} or {@link reversed} is in use.
 *
 * @example
 * const list = new DoublyLinkedList<number>()
 * list.appendRight(1)
 * list.appendRight(2)
 * list.appendLeft(0)
 * Array.from(list) // [0, 1, 2]
 * list.popLeft() // 0
 * list.get(1) // 2
 */
export default class DoublyLinkedList<T> implements Iterable<T> {
  private head: null|Node<T> = null
  private tail: null|Node<T> = null
  private _length = 0

  /** Number of values in the list, O(1) */
  get length(): number { return this._length }

  get [Symbol.toStringTag]() { return 'DoublyLinkedList' }

  toString(): string {
    return `[${this[Symbol.toStringTag]} length:${this._length}]`
  }

  /** Insert a value before the current head */
  appendLeft(value: T): void {
    const node: Node<T> = {value, prev: null, next: this.head}
    if (this.head == null) {
      this.tail = node
    } else {
      this.head.prev = node
    }
    this.head = node
    this._length += 1
  }

  /** Insert a value after the current tail */
  appendRight(value: T): void {
    const node: Node<T> = {value, prev: this.tail, next: null}
    if (this.tail == null) {
      this.head = node
    } else {
      this.tail.next = node
    }
    this.tail = node
    this._length += 1
  }

  /** Remove and return the head value, or undefined when the list is empty */
  popLeft(): undefined|T {
    const node = this.head
    if (node == null)
      return
    if (node === this.tail) {
      this.head = this.tail = null
      this._length = 0
      return node.value
    }
    const head = expectNode(node.next, 'head.next')
    head.prev = null
    this.head = head
    node.next = null
    this._length -= 1
    return node.value
  }

  /** Remove and return the tail value, or undefined when the list is empty */
  popRight(): undefined|T {
    const node = this.tail
    if (node == null)
      return
    if (node === this.head) {
      this.head = this.tail = null
      this._length = 0
      return node.value
    }
    const tail = expectNode(node.prev, 'tail.prev')
    tail.next = null
    this.tail = tail
    node.prev = null
    this._length -= 1
    return node.value
  }

  peekLeft(): undefined|T {
    if (this.head)
      return this.head.value
  }

  peekRight(): undefined|T {
    if (this.tail)
      return this.tail.value
  }

  /**
   * Value at a zero-based position. Walks from whichever end is closer, so
   * this costs O(min(index, length - index)).
   * @throws {@link ListIndexError} unless 0 <= index < length
   */
  get(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this._length)
      throw new ListIndexError(index, this._length)
    let node: Node<T>
    if (index < Math.floor(this._length / 2)) {
      node = expectNode(this.head, 'head')
      for (let i = 0; i < index; i++)
        node = expectNode(node.next, `node[${i}].next`)
    } else {
      node = expectNode(this.tail, 'tail')
      for (let i = this._length - 1; i > index; i--)
        node = expectNode(node.prev, `node[${i}].prev`)
    }
    return node.value
  }

  /** Values from head to tail. Each call starts a new traversal. */
  *values(): Generator<T, void, undefined> {
    for (let node = this.head; node; node = node.next)
      yield node.value
  }

  /** Values from tail to head */
  *reversed(): Generator<T, void, undefined> {
    for (let node = this.tail; node; node = node.prev)
      yield node.value
  }

  [Symbol.iterator](): Generator<T, void, undefined> {
    return this.values()
  }
}

export {DoublyLinkedList}
