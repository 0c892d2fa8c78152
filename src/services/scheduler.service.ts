import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, CronJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

/**
 * Thin wrapper around toad-scheduler for cron-driven jobs.
 */
export class SchedulerService {
  private readonly scheduler: ToadScheduler
  private readonly log: FastifyBaseLogger
  private readonly jobs = new Set<string>()

  constructor(baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'SCHEDULER')
    this.scheduler = new ToadScheduler()
  }

  /**
   * Registers `handler` under `name` on a cron expression, replacing any
   * job of the same name. Overlapping executions of one job are prevented.
   */
  scheduleCron(name: string, expression: string, handler: JobHandler): void {
    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
    }

    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        this.log.debug(`Running scheduled job: ${name}`)
        await handler(name)
        this.log.debug(`Job ${name} completed`)
      },
      (error) => {
        this.log.error({ error }, `Error in job ${name}`)
      },
    )

    this.scheduler.addCronJob(
      new CronJob({ cronExpression: expression }, task, {
        id: name,
        preventOverrun: true,
      }),
    )
    this.jobs.add(name)
    this.log.info(`Scheduled job ${name} with cron '${expression}'`)
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
    this.jobs.clear()
  }
}
