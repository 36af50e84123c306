// node --import tsx benchmark.ts
/* eslint no-console: off */
import {Bench} from 'tinybench'

import DoublyLinkedList from './src'

declare global {
  namespace NodeJS {
    export interface ProcessEnv {
      /** Number of values pushed and popped per task */
      BENCH_SIZE?: string
      /** Minimum run time per task, in milliseconds */
      BENCH_TIME?: string
    }
  }
}

const BENCH_SIZE = parseInt(process.env.BENCH_SIZE || '1000', 10)
const BENCH_TIME = parseInt(process.env.BENCH_TIME || '500', 10)
if (!(BENCH_SIZE > 0))
  throw new TypeError('BENCH_SIZE must be a positive integer')
if (!(BENCH_TIME > 0))
  throw new TypeError('BENCH_TIME must be a positive integer')

console.log(`
BENCH_SIZE=${BENCH_SIZE}
BENCH_TIME=${BENCH_TIME}
`)

function addQueue(bench: Bench) {
  bench.add(`DoublyLinkedList appendRight/popLeft (${BENCH_SIZE})`, () => {
    const list = new DoublyLinkedList<number>()
    for (let i = 0; i < BENCH_SIZE; i++) list.appendRight(i)
    while (list.popLeft() !== undefined);
  })
  bench.add(`Array push/shift (${BENCH_SIZE})`, () => {
    const arr: number[] = []
    for (let i = 0; i < BENCH_SIZE; i++) arr.push(i)
    while (arr.shift() !== undefined);
  })
}

function addDeque(bench: Bench) {
  bench.add(`DoublyLinkedList appendLeft/popRight (${BENCH_SIZE})`, () => {
    const list = new DoublyLinkedList<number>()
    for (let i = 0; i < BENCH_SIZE; i++) list.appendLeft(i)
    while (list.popRight() !== undefined);
  })
  bench.add(`Array unshift/pop (${BENCH_SIZE})`, () => {
    const arr: number[] = []
    for (let i = 0; i < BENCH_SIZE; i++) arr.unshift(i)
    while (arr.pop() !== undefined);
  })
}

function addIndexed(bench: Bench) {
  const list = new DoublyLinkedList<number>()
  for (let i = 0; i < BENCH_SIZE; i++) list.appendRight(i)
  bench.add(`DoublyLinkedList get() every index (${BENCH_SIZE})`, () => {
    for (let i = 0; i < BENCH_SIZE; i++) list.get(i)
  })
}

async function main() {
  const bench = new Bench({time: BENCH_TIME})
  addQueue(bench)
  addDeque(bench)
  addIndexed(bench)

  await bench.run()

  console.table(bench.table())
}

main().catch(err => {
  console.error(err)
  process.exitCode = 1
})
