import type { Config } from '@root/types/config.types.js'
import type { ArrClientConfig } from './catalog-client.js'

type ArrServiceName = 'radarr' | 'sonarr'

/**
 * Builds a catalog client configuration, or returns null when the URL or
 * API key is missing.
 */
export function arrClientConfigFrom(
  config: Config,
  service: ArrServiceName,
): ArrClientConfig | null {
  const baseUrl =
    service === 'radarr' ? config.radarrUrl : config.sonarrUrl
  const apiKey =
    service === 'radarr' ? config.radarrApiKey : config.sonarrApiKey

  if (!baseUrl || !apiKey) {
    return null
  }

  return {
    baseUrl,
    apiKey,
    apiPath: config.arrApiPath,
    timeoutMs: config.httpTimeoutSeconds * 1000,
    retry: {
      maxRetries: config.httpMaxRetries,
      backoffFactorMs: config.httpBackoffFactor * 1000,
    },
  }
}
