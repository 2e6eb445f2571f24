export type * from './run.js'
export type * from './discovery.js'
export type * from './events.js'
export type * from './report.js'
