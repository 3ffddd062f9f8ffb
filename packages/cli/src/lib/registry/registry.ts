import { LockAcquisitionFailure } from '../errors'
import type { RegistrationEntry } from './entry'

export type RegistrySnapshot = Map<string, RegistrationEntry[]>

/**
 * Registration entries of one build pass, keyed by scope.
 *
 * Entries are only appended. Scopes and the entries within a scope keep
 * insertion order, so snapshots iterate in the order declarations were
 * processed.
 *
 * Readers-writer discipline: reads may nest and overlap, a write is exclusive.
 * All operations are synchronous, so the only way to contend is re-entrancy
 * (an insert issued from inside `read`). Such a request fails with
 * `LockAcquisitionFailure` instead of waiting.
 */
export class RouteRegistry {
  private readonly entries = new Map<string, RegistrationEntry[]>()
  private readers = 0
  private writing = false

  insert(scope: string, entry: RegistrationEntry): void {
    this.acquireWrite()
    try {
      const list = this.entries.get(scope)
      if (list) {
        list.push(entry)
      } else {
        this.entries.set(scope, [entry])
      }
    } finally {
      this.writing = false
    }
  }

  snapshotFor(scope: string): RegistrationEntry[] {
    return this.read(() => [...(this.entries.get(scope) ?? [])])
  }

  snapshotAll(): RegistrySnapshot {
    return this.read(() => new Map(Array.from(this.entries, ([scope, list]) => [scope, [...list]])))
  }

  /**
   * Runs `fn` while holding the read lock. Snapshots taken inside see the
   * same registry state.
   */
  read<T>(fn: () => T): T {
    this.acquireRead()
    try {
      return fn()
    } finally {
      this.readers -= 1
    }
  }

  get size(): number {
    return this.read(() => {
      let total = 0
      for (const list of this.entries.values()) total += list.length
      return total
    })
  }

  private acquireRead(): void {
    if (this.writing) {
      throw new LockAcquisitionFailure('read', 'a write is in progress')
    }
    this.readers += 1
  }

  private acquireWrite(): void {
    if (this.writing) {
      throw new LockAcquisitionFailure('write', 'another write is in progress')
    }
    if (this.readers > 0) {
      throw new LockAcquisitionFailure('write', `${this.readers} read(s) in progress`)
    }
    this.writing = true
  }
}
