type QueueEntry<T> = {
  item: T
  sequence: number
}

/**
 * Binary min-heap ordered by `compare`, with a position index so an item
 * already queued can be repositioned instead of queued twice. Items comparing
 * equal come out in the order they entered the queue; repositioning keeps an
 * item's place in that order.
 */
export class PriorityQueue<T> {
  private heap: QueueEntry<T>[] = []
  private positions = new Map<T, number>()
  private nextSequence = 0

  constructor(private compare: (a: T, b: T) => number) {}

  get size(): number {
    return this.heap.length
  }

  isEmpty(): boolean {
    return this.heap.length === 0
  }

  has(item: T): boolean {
    return this.positions.has(item)
  }

  peek(): T | undefined {
    return this.heap[0]?.item
  }

  enqueue(item: T): void {
    if (this.positions.has(item)) {
      this.update(item)
      return
    }
    this.heap.push({ item, sequence: this.nextSequence++ })
    this.positions.set(item, this.heap.length - 1)
    this.bubbleUp(this.heap.length - 1)
  }

  /** Restores heap order after the priority of a queued item changed. */
  update(item: T): void {
    const position = this.positions.get(item)
    if (position === undefined) return
    this.bubbleDown(this.bubbleUp(position))
  }

  dequeue(): T | undefined {
    const top = this.heap[0]
    if (!top) return undefined
    const last = this.heap.pop()
    this.positions.delete(top.item)
    if (last && this.heap.length > 0) {
      this.heap[0] = last
      this.positions.set(last.item, 0)
      this.bubbleDown(0)
    }
    return top.item
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i]
    const b = this.heap[j]
    const order = this.compare(a.item, b.item)
    return order < 0 || (order === 0 && a.sequence < b.sequence)
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i]
    const b = this.heap[j]
    this.heap[i] = b
    this.heap[j] = a
    this.positions.set(b.item, i)
    this.positions.set(a.item, j)
  }

  private bubbleUp(i: number): number {
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!this.less(i, parent)) break
      this.swap(i, parent)
      i = parent
    }
    return i
  }

  private bubbleDown(i: number): void {
    const n = this.heap.length
    while (true) {
      const l = i * 2 + 1
      const r = l + 1
      let smallest = i
      if (l < n && this.less(l, smallest)) smallest = l
      if (r < n && this.less(r, smallest)) smallest = r
      if (smallest === i) break
      this.swap(i, smallest)
      i = smallest
    }
  }
}
