import { EventEmitter, on } from 'node:events'
import type {
  ProgressEvent,
  ProgressEventType,
  ProgressPublisher,
} from '@root/types/progress.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

const PROGRESS_EVENT = 'progress'

function isProgressEvent(value: unknown): value is ProgressEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sequence' in value &&
    'type' in value &&
    'message' in value
  )
}

/**
 * Fan-out progress stream. Every subscriber sees every event published
 * after it attached; events waiting for a slow subscriber buffer in that
 * subscriber's iterator, so publishing never blocks.
 */
export class ProgressService implements ProgressPublisher {
  private readonly eventEmitter: EventEmitter
  private readonly activeConnections: Set<string> = new Set()
  private readonly log: FastifyBaseLogger
  private sequence = 0

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.log = createServiceLogger(baseLog, 'EVENT_EMITTER')
    this.eventEmitter = new EventEmitter()
    // Allow many concurrent SSE consumers without warnings
    this.eventEmitter.setMaxListeners(100)
  }

  addConnection(id: string) {
    this.activeConnections.add(id)
    this.log.debug(`Adding progress connection: ${id}`)
  }

  removeConnection(id: string) {
    this.activeConnections.delete(id)
    this.log.debug(`Removing progress connection: ${id}`)
  }

  hasActiveConnections(): boolean {
    return this.activeConnections.size > 0
  }

  publish(type: ProgressEventType, message: string): ProgressEvent {
    this.sequence += 1
    const event: ProgressEvent = {
      sequence: this.sequence,
      type,
      message,
      timestamp: this.clock().toISOString(),
    }
    this.log.trace({ event }, 'Emitting progress event')
    this.eventEmitter.emit(PROGRESS_EVENT, event)
    return event
  }

  /**
   * Yields events until `signal` aborts. The listener is attached on the
   * first `next()` call.
   */
  async *subscribe(signal: AbortSignal): AsyncGenerator<ProgressEvent> {
    try {
      for await (const [event] of on(this.eventEmitter, PROGRESS_EVENT, {
        signal,
      })) {
        if (isProgressEvent(event)) {
          yield event
        }
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return
      }
      throw error
    }
  }
}
