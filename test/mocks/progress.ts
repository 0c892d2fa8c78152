import type {
  ProgressEvent,
  ProgressEventType,
  ProgressPublisher,
} from '@root/types/progress.types.js'

/** Publisher that only records `[type, message]` pairs in order. */
export function createProgressRecorder(): {
  progress: ProgressPublisher
  events: Array<[ProgressEventType, string]>
} {
  const events: Array<[ProgressEventType, string]> = []
  const progress: ProgressPublisher = {
    publish(type, message): ProgressEvent {
      events.push([type, message])
      return {
        sequence: events.length,
        type,
        message,
        timestamp: '2026-10-19T08:00:00.000Z',
      }
    },
  }
  return { progress, events }
}
