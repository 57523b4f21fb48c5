/**
 * Ordered store of open marks.
 *
 * Behaves as a stack for unlabeled resolution and supports removing the
 * most recent entry with a given label from any position, keeping the
 * relative order of the rest.
 */

export class PendingStack<T extends { readonly label: string }> {
  private readonly items: T[] = []

  /** Number of open entries. */
  get depth(): number {
    return this.items.length
  }

  push(item: T): void {
    this.items.push(item)
  }

  /** Most recently pushed entry. */
  peek(): T | undefined {
    return this.items[this.items.length - 1]
  }

  /** Most recently pushed entry carrying `label`. */
  findLabel(label: string): T | undefined {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const item = this.items[i]
      if (item !== undefined && item.label === label) return item
    }
    return undefined
  }

  hasLabel(label: string): boolean {
    return this.findLabel(label) !== undefined
  }

  /** Remove a specific entry wherever it sits. Returns false if absent. */
  remove(item: T): boolean {
    const idx = this.items.lastIndexOf(item)
    if (idx < 0) return false
    this.items.splice(idx, 1)
    return true
  }

  /** Iterate bottom to top. */
  *[Symbol.iterator](): Iterator<T> {
    yield* this.items
  }

  /** Convert to array (bottom to top). */
  toArray(): T[] {
    return [...this.items]
  }

  /** Remove all entries, returning them bottom to top. */
  clear(): T[] {
    return this.items.splice(0, this.items.length)
  }
}
