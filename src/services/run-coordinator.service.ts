import type { ProgressPublisher } from '@root/types/progress.types.js'
import type {
  CycleOutcome,
  RunResult,
  UpgradeTarget,
} from '@root/types/upgrade.types.js'
import { errorMessage, errorName } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import type { RunStateStore } from './upgrade/run-state.js'

/** What the coordinator runs under its lock. */
export interface CycleRunner {
  runTarget(target: UpgradeTarget): Promise<CycleOutcome[]>
}

export type TriggerResult =
  | { accepted: true; run: Promise<RunResult> }
  | { accepted: false; reason: 'conflict' }

/**
 * Single-flight gate around full upgrade runs.
 *
 * A trigger while a run is in flight is rejected, never queued. Accepted
 * runs execute in the background; the returned `run` promise settles with
 * the result and never rejects.
 */
export class RunCoordinator {
  private readonly log: FastifyBaseLogger
  private locked = false
  private activeRun: Promise<RunResult> | null = null

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly runner: CycleRunner,
    private readonly state: RunStateStore,
    private readonly progress: ProgressPublisher,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.log = createServiceLogger(baseLog, 'RUN_COORDINATOR')
  }

  get isRunning(): boolean {
    return this.locked
  }

  trigger(target: UpgradeTarget): TriggerResult {
    if (this.locked) {
      this.log.info(`Rejected trigger for ${target}: run already in progress`)
      return { accepted: false, reason: 'conflict' }
    }

    // Taken synchronously so a second trigger in the same tick conflicts
    this.locked = true
    this.state.markStarted(this.clock())
    const run = this.execute(target)
    this.activeRun = run
    return { accepted: true, run }
  }

  /** Resolves once no run is in flight. */
  async waitForIdle(): Promise<void> {
    while (this.activeRun && this.locked) {
      await this.activeRun
    }
  }

  private async execute(target: UpgradeTarget): Promise<RunResult> {
    let result: RunResult = { ok: false, target, outcomes: [] }
    this.progress.publish(
      'info',
      `run_start ${target} ${this.clock().toISOString()}`,
    )
    this.log.info(`Upgrade run started for ${target}`)

    try {
      const outcomes = await this.runner.runTarget(target)
      const ok = outcomes.every((outcome) => outcome.state !== 'failed')
      result = { ok, target, outcomes }
      this.progress.publish('done', ok ? 'ok' : 'completed with errors')
    } catch (error) {
      this.log.error({ error }, `Upgrade run for ${target} failed`)
      this.progress.publish(
        'error',
        `${errorName(error)}: ${errorMessage(error)}`,
      )
      this.progress.publish('done', 'completed with errors')
      result = { ok: false, target, outcomes: [], error: errorMessage(error) }
    } finally {
      this.state.markFinished(this.clock(), result)
      this.locked = false
      this.log.info(`Upgrade run for ${target} finished (ok=${result.ok})`)
    }

    return result
  }
}
