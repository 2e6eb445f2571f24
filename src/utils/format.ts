import { posix } from 'path'

const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * Format a date in local time as `yyyy-MM-dd HH:mm:ss`
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

/**
 * Format duration in seconds
 */
export function formatDuration(ms: number): string {
  return (ms / 1000).toFixed(2)
}

/**
 * Directory part of a relative path, `.` at the root
 */
export function relativeDirOf(relativePath: string): string {
  return posix.dirname(relativePath)
}
