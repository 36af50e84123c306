import {DoublyLinkedList} from './DoublyLinkedList'

export default DoublyLinkedList
export {DoublyLinkedList}
export {ListError, ListIndexError} from './exception'
