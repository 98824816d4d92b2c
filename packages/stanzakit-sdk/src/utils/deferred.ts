/**
 * Single-assignment result slot.
 *
 * The first call to `resolve` or `reject` wins; later calls are ignored.
 * `settled` tells whether the slot has been filled.
 */
export interface Deferred<T> {
  readonly promise: Promise<T>
  readonly settled: boolean
  resolve(value: T): void
  reject(reason: unknown): void
}

export function createDeferred<T>(): Deferred<T> {
  let settled = false
  let resolvePromise: (value: T) => void = () => {}
  let rejectPromise: (reason: unknown) => void = () => {}
  const promise = new Promise<T>((resolve, reject) => {
    resolvePromise = resolve
    rejectPromise = reject
  })

  return {
    promise,
    get settled() {
      return settled
    },
    resolve(value) {
      if (settled) return
      settled = true
      resolvePromise(value)
    },
    reject(reason) {
      if (settled) return
      settled = true
      rejectPromise(reason)
    },
  }
}
