import { SchedulerService } from '@services/scheduler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    scheduler: SchedulerService
  }
}

export const UPGRADE_JOB_NAME = 'upgrade-cycle'

export default fp(
  async (fastify: FastifyInstance) => {
    const scheduler = new SchedulerService(fastify.log)
    fastify.decorate('scheduler', scheduler)

    const expression = fastify.config.upgradeCronSchedule.trim()
    if (expression) {
      scheduler.scheduleCron(UPGRADE_JOB_NAME, expression, async () => {
        const trigger = fastify.runCoordinator.trigger('both')
        if (!trigger.accepted) {
          fastify.log.info(
            'Scheduled upgrade skipped: run already in progress',
          )
          return
        }
        await trigger.run
      })
    } else {
      fastify.log.info(
        'upgradeCronSchedule is empty, scheduled cycles disabled',
      )
    }

    fastify.addHook('onClose', async () => {
      scheduler.stop()
    })
  },
  {
    name: 'scheduler',
    dependencies: ['config', 'upgrade-engine'],
  },
)
