import type { RunEvent } from '../../types/events.js'
import type { ProgressReporter } from './base.js'
import * as log from '../../utils/logger.js'
import { formatDuration, formatTimestamp } from '../../utils/format.js'

/**
 * One rendered line and how it should be written
 */
export type ConsoleLine =
  | { kind: 'line' | 'success' | 'warn' | 'error'; text: string }
  | { kind: 'outcome'; succeeded: boolean; text: string }

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`

/**
 * Render an event as console lines
 */
export function formatEvent(event: RunEvent): ConsoleLine[] {
  switch (event.type) {
    case 'run-started':
      return [
        { kind: 'line', text: `Input : ${event.options.inputRoot}` },
        { kind: 'line', text: `Output: ${event.options.outputRoot}` }
      ]

    case 'discovery-completed': {
      const lines: ConsoleLine[] = []
      if (event.error) {
        lines.push({ kind: 'error', text: `Discovery failed: ${event.error}` })
      }
      for (const skip of event.skipped) {
        lines.push({
          kind: 'warn',
          text: `Skipped ${skip.path} (${skip.reason}): ${skip.message}`
        })
      }
      if (event.entries.length > 0) {
        lines.push({ kind: 'line', text: `Found ${plural(event.entries.length, 'entry file')}:` })
        for (const entry of event.entries) {
          lines.push({ kind: 'line', text: `  - ${entry.relativePath}` })
        }
      }
      return lines
    }

    case 'nothing-found':
      return [{ kind: 'line', text: 'No entry files found' }]

    case 'item-started':
      return [
        {
          kind: 'line',
          text: `[${event.position}/${event.total}] Processing: ${event.entry.relativePath}`
        }
      ]

    case 'item-read':
      return [
        { kind: 'line', text: `  Size: ${event.file.sizeBytes} bytes` },
        { kind: 'line', text: `  Modified: ${formatTimestamp(event.file.lastModified)}` },
        { kind: 'line', text: `  Directory: ${event.file.relativeDir}` }
      ]

    case 'item-completed': {
      const { outcome } = event
      const lines: ConsoleLine[] = Object.entries(outcome.details).map(([key, value]) => ({
        kind: 'line' as const,
        text: `  ${key}: ${value}`
      }))
      if (outcome.succeeded) {
        lines.push({ kind: 'outcome', succeeded: true, text: outcome.entry.relativePath })
      } else {
        const stage = outcome.failedStage ? ` [${outcome.failedStage}]` : ''
        lines.push({
          kind: 'outcome',
          succeeded: false,
          text: `${outcome.entry.relativePath}${stage}: ${outcome.errorMessage ?? 'Unknown error'}`
        })
      }
      return lines
    }

    case 'run-completed': {
      const { summary } = event
      return [
        {
          kind: summary.totalFailed === 0 ? 'success' : 'warn',
          text:
            `Completed ${plural(summary.totalDiscovered, 'file')}: ` +
            `${summary.totalSucceeded} succeeded, ${summary.totalFailed} failed ` +
            `(${formatDuration(event.duration)}s)`
        }
      ]
    }
  }
}

/**
 * Writes run progress to the terminal through the logger
 */
export class ConsoleReporter implements ProgressReporter {
  handle(event: RunEvent): void {
    for (const line of formatEvent(event)) {
      switch (line.kind) {
        case 'line':
          log.line(line.text)
          break
        case 'success':
          log.success(line.text)
          break
        case 'warn':
          log.warn(line.text)
          break
        case 'error':
          log.error(line.text)
          break
        case 'outcome':
          log.outcome(line.succeeded, line.text)
          break
      }
    }
  }
}
