/**
 * One side of a double-ended cursor, viewed through a projection.
 */
export class ProjectedIterator<T> implements IterableIterator<T> {
  constructor(
    private readonly front: () => T | undefined,
    private readonly back: () => T | undefined,
  ) {}

  next(): IteratorResult<T, undefined> {
    return step(this.front())
  }

  nextBack(): IteratorResult<T, undefined> {
    return step(this.back())
  }

  /**
   * Same cursor, ends swapped.
   */
  reversed(): ProjectedIterator<T> {
    return new ProjectedIterator(this.back, this.front)
  }

  [Symbol.iterator](): ProjectedIterator<T> {
    return this
  }
}

export function step<T>(value: T | undefined): IteratorResult<T, undefined> {
  return value === undefined ? { done: true, value: undefined } : { done: false, value }
}
