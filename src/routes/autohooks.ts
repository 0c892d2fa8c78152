import { authorizeRequest } from '@utils/auth.js'
import { IpAllowList, normalizeIpAddress } from '@utils/ip.js'
import type { FastifyInstance } from 'fastify'

const API_PREFIX = '/api/'

export default async function (fastify: FastifyInstance) {
  // Built once at startup; the allow-list is part of the static config
  const allowList = IpAllowList.parse(fastify.config.allowedIps)

  if (allowList.invalidEntries.length > 0) {
    fastify.log.warn(
      { entries: allowList.invalidEntries },
      'Ignoring malformed allowedIps entries (they only match verbatim)',
    )
  }

  fastify.log.debug(
    {
      allowedIps: allowList.entries,
      tokenConfigured: !!fastify.config.apiToken,
    },
    'Computed API access settings',
  )

  fastify.addHook('onRequest', async (request, reply) => {
    const urlWithoutQuery = request.url.split('?')[0]

    // Liveness and anything outside the API stay public
    if (!urlWithoutQuery.startsWith(API_PREFIX)) {
      return
    }

    const decision = authorizeRequest(
      {
        ip: normalizeIpAddress(request.ip),
        authorization: request.headers.authorization,
      },
      {
        apiToken: fastify.config.apiToken,
        isAddressAllowed: (ip) => allowList.allows(ip),
      },
    )

    if (decision.allowed) {
      return
    }

    request.log.debug(
      { ip: request.ip, url: urlWithoutQuery, status: decision.statusCode },
      'Rejected API request',
    )

    switch (decision.statusCode) {
      case 403:
        return reply.forbidden(decision.message)
      case 503:
        return reply.serviceUnavailable(decision.message)
      case 401:
        return reply.unauthorized(decision.message)
    }
  })
}
