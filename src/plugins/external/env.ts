import env from '@fastify/env'
import type { Config, ConfigOverrides } from '@root/types/config.types.js'
import { validLogLevels } from '@utils/logger.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 8998,
    },
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    logLevel: {
      type: 'string',
      enum: validLogLevels,
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    apiToken: {
      type: 'string',
      default: '',
    },
    allowedIps: {
      type: 'string',
      default: '',
    },
    radarrEnabled: {
      type: 'boolean',
      default: false,
    },
    radarrUrl: {
      type: 'string',
      default: '',
    },
    radarrApiKey: {
      type: 'string',
      default: '',
    },
    radarrUpgradeCount: {
      type: 'integer',
      minimum: 1,
      default: 1,
    },
    sonarrEnabled: {
      type: 'boolean',
      default: false,
    },
    sonarrUrl: {
      type: 'string',
      default: '',
    },
    sonarrApiKey: {
      type: 'string',
      default: '',
    },
    sonarrUpgradeCount: {
      type: 'integer',
      minimum: 1,
      default: 1,
    },
    upgradeTag: {
      type: 'string',
      minLength: 1,
      default: 'upgrade-cf',
    },
    arrApiPath: {
      type: 'string',
      default: '/api/v3/',
    },
    httpTimeoutSeconds: {
      type: 'number',
      exclusiveMinimum: 0,
      default: 15,
    },
    httpMaxRetries: {
      type: 'integer',
      minimum: 0,
      default: 3,
    },
    httpBackoffFactor: {
      type: 'number',
      minimum: 0,
      default: 0.5,
    },
    maxParallelRequests: {
      type: 'integer',
      minimum: 1,
      default: 8,
    },
    upgradeCronSchedule: {
      type: 'string',
      default: '0 * * * *',
    },
  },
}

export interface ConfigPluginOptions {
  /** Merged over `process.env`; used by tests */
  configOverrides?: ConfigOverrides
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp<ConfigPluginOptions>(
  async (fastify: FastifyInstance, opts) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: { ...process.env, ...opts.configOverrides },
    })

    if (!fastify.config.apiToken) {
      fastify.log.warn(
        'apiToken is not set: every authenticated API call will answer 503',
      )
    }

    for (const kind of ['radarr', 'sonarr'] as const) {
      const enabled = fastify.config[`${kind}Enabled` as const]
      const url = fastify.config[`${kind}Url` as const]
      const apiKey = fastify.config[`${kind}ApiKey` as const]
      if (enabled && (!url || !apiKey)) {
        fastify.log.warn(
          `${kind} is enabled but ${kind}Url or ${kind}ApiKey is missing`,
        )
      }
    }
  },
  {
    name: 'config',
  },
)
