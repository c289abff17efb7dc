export type { ObservabilitySink, SinkHook } from './sinks.js'
export { notifySinks, createLoggingSink, createEventBusSink } from './sinks.js'
