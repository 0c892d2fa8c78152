export type ProgressEventType = 'info' | 'error' | 'done'

export interface ProgressEvent {
  /** Monotonically increasing per process, starting at 1 */
  sequence: number
  type: ProgressEventType
  message: string
  timestamp: string
}

/** Anything progress can be reported to. */
export interface ProgressPublisher {
  publish(type: ProgressEventType, message: string): ProgressEvent
}
