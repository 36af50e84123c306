import {ListError} from './exception'

/**
 * Unwrap a link which must be present because of the list's own bookkeeping,
 * e.g. `head.next` while length > 1. A null here means the container is
 * corrupt, not that the caller did something wrong.
 * @internal
 */
export function expectNode<T>(node: null|T, what: string): T {
  if (node == null) {
    const err = new ListError('INVARIANT', `broken list invariant: ${what} is null`)
    Error.captureStackTrace(err, expectNode)
    throw err
  }
  return node
}
