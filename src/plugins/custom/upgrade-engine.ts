import type { Config } from '@root/types/config.types.js'
import type { EngineSettings } from '@root/types/upgrade.types.js'
import { RunCoordinator } from '@services/run-coordinator.service.js'
import { RunStateStore } from '@services/upgrade/run-state.js'
import { UpgradeEngineService } from '@services/upgrade-engine.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    upgradeEngine: UpgradeEngineService
    runCoordinator: RunCoordinator
    runState: RunStateStore
  }
}

const MIN_PARALLEL_REQUESTS = 2

export function engineSettingsFrom(config: Config): EngineSettings {
  return {
    tagLabel: config.upgradeTag,
    concurrency: Math.max(MIN_PARALLEL_REQUESTS, config.maxParallelRequests),
    movies: {
      enabled: config.radarrEnabled,
      upgradeCount: config.radarrUpgradeCount,
    },
    episodes: {
      enabled: config.sonarrEnabled,
      upgradeCount: config.sonarrUpgradeCount,
    },
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const state = new RunStateStore()
    const engine = new UpgradeEngineService(fastify.log, {
      movies: fastify.radarr,
      episodes: fastify.sonarr,
      settings: engineSettingsFrom(fastify.config),
      state,
      progress: fastify.progress,
    })
    const coordinator = new RunCoordinator(
      fastify.log,
      engine,
      state,
      fastify.progress,
    )

    fastify.decorate('runState', state)
    fastify.decorate('upgradeEngine', engine)
    fastify.decorate('runCoordinator', coordinator)

    // An in-flight cycle runs to completion; shutdown waits for it
    fastify.addHook('onClose', async () => {
      if (coordinator.isRunning) {
        fastify.log.info('Waiting for the running upgrade cycle to finish')
      }
      await coordinator.waitForIdle()
    })
  },
  {
    name: 'upgrade-engine',
    dependencies: ['config', 'radarr', 'sonarr', 'progress'],
  },
)
