/**
 * Storage cells
 *
 * Contract state lives in cells registered with the chain. Opening a call
 * frame captures every registered cell; aborting the frame restores them.
 */

export interface StateCell {
  /** Copy the current contents and return a function that puts them back */
  capture(): () => void
}

/**
 * A single stored value.
 */
export class StoredValue<T> implements StateCell {
  constructor(private current: T) {}

  get value(): T {
    return this.current
  }

  set value(next: T) {
    this.current = next
  }

  capture(): () => void {
    const saved = this.current
    return () => {
      this.current = saved
    }
  }
}

/**
 * A keyed store. Missing keys read as `undefined`; callers supply their own
 * default (`balances.get(account) ?? 0n`).
 */
export class StoredMap<K, V> implements StateCell {
  private data = new Map<K, V>()

  get(key: K): V | undefined {
    return this.data.get(key)
  }

  has(key: K): boolean {
    return this.data.has(key)
  }

  set(key: K, value: V): void {
    this.data.set(key, value)
  }

  delete(key: K): void {
    this.data.delete(key)
  }

  keys(): K[] {
    return Array.from(this.data.keys())
  }

  entries(): Array<[K, V]> {
    return Array.from(this.data.entries())
  }

  get size(): number {
    return this.data.size
  }

  capture(): () => void {
    const saved = new Map(this.data)
    return () => {
      this.data = saved
    }
  }
}
