import assert from 'node:assert/strict'
import DoublyLinkedList from '../src'
import type {Node} from '../src/DoublyLinkedList'

/**
 * Walk every link in both directions and check the structural invariants.
 * Returns the values, head to tail.
 */
export function assertLinked<T>(list: DoublyLinkedList<T>): T[] {
  const head = list['head']
  const tail = list['tail']
  if (list.length === 0) {
    assert.equal(head, null, 'empty list has no head')
    assert.equal(tail, null, 'empty list has no tail')
    return []
  }
  if (head == null || tail == null)
    return assert.fail('non-empty list is missing head or tail')
  assert.equal(head.prev, null, 'head.prev is null')
  assert.equal(tail.next, null, 'tail.next is null')

  const values: T[] = []
  let prev: null|Node<T> = null
  for (let node: null|Node<T> = head; node; node = node.next) {
    assert.equal(node.prev, prev, `node[${values.length}].prev links back`)
    values.push(node.value)
    prev = node
  }
  assert.equal(prev, tail, 'forward walk ends at tail')
  assert.equal(values.length, list.length, 'length matches reachable nodes')

  const backward: T[] = []
  for (let node: null|Node<T> = tail; node; node = node.prev)
    backward.push(node.value)
  assert.deepEqual(backward.reverse(), values, 'backward walk matches forward walk')
  return values
}

export function fromValues<T>(values: T[]): DoublyLinkedList<T> {
  const list = new DoublyLinkedList<T>()
  for (const value of values)
    list.appendRight(value)
  return list
}

/** Small seeded PRNG (mulberry32) so failures can be replayed */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6D2B79F5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}
