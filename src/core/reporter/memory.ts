import type { RunEvent, RunEventType } from '../../types/events.js'
import type { ProgressReporter } from './base.js'

/**
 * Keeps every event it receives
 */
export class MemoryReporter implements ProgressReporter {
  readonly events: RunEvent[] = []

  handle(event: RunEvent): void {
    this.events.push(event)
  }

  /**
   * Events of one type, in arrival order
   */
  ofType<T extends RunEventType>(type: T): Extract<RunEvent, { type: T }>[] {
    return this.events.filter(
      (event): event is Extract<RunEvent, { type: T }> => event.type === type
    )
  }

  get types(): RunEventType[] {
    return this.events.map(event => event.type)
  }

  clear(): void {
    this.events.length = 0
  }
}
