import fastifySwagger from '@fastify/swagger'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  fastify.log.debug(
    `Configuring Swagger with base URL: ${fastify.config.baseUrl}`,
  )

  return {
    openapi: {
      info: {
        title: 'Upgradarr API',
        description:
          'Cycles Radarr and Sonarr libraries towards their custom format cutoff scores',
        version: 'V1',
      },
      servers: [
        {
          url: fastify.config.baseUrl,
          description: 'Primary Server',
        },
        {
          url: `http://localhost:${fastify.config.port}`,
          description: 'Localhost Access (with port)',
        },
      ],
      tags: [
        {
          name: 'System',
          description: 'Health and run status endpoints',
        },
        {
          name: 'Upgrades',
          description: 'Upgrade cycle endpoints',
        },
        {
          name: 'Queue',
          description: 'Download queue and eligibility views',
        },
        {
          name: 'Progress',
          description: 'Server-sent progress events',
        },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http' as const,
            scheme: 'bearer',
            description: 'Shared API token in the Authorization header',
          },
        },
      },
      security: [{ bearerAuth: [] }],
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * Register Swagger; the document is served by the openapi route
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
