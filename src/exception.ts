/** Base class for errors raised by the list. `code` is stable, `message` is not. */
class ListError extends Error {
  code: string
  /** @internal */
  constructor(code: string, message: string) {
    super(message)
    this.name = 'ListError'
    this.code = code
  }
}

/**
 * Thrown by {@link DoublyLinkedList.get} when the index is not an integer in
 * the range `[0, length)`. The index is never clamped.
 */
class ListIndexError extends ListError {
  /** @internal */
  name = 'ListIndexError'
  /** The index that was requested */
  index: number
  /** Length of the list at the time of the call */
  length: number
  /** @internal */
  constructor(index: number, length: number) {
    super('INDEX_OUT_OF_RANGE', `index out of range: ${index} (length ${length})`)
    this.index = index
    this.length = length
  }
}

export {ListError, ListIndexError}
