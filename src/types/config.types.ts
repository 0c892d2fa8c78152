export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // Server
  port: number
  baseUrl: string
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number

  // API access
  apiToken: string
  allowedIps: string

  // Radarr
  radarrEnabled: boolean
  radarrUrl: string
  radarrApiKey: string
  radarrUpgradeCount: number

  // Sonarr
  sonarrEnabled: boolean
  sonarrUrl: string
  sonarrApiKey: string
  sonarrUpgradeCount: number

  // Upgrade engine
  upgradeTag: string
  arrApiPath: string
  httpTimeoutSeconds: number
  httpMaxRetries: number
  httpBackoffFactor: number
  maxParallelRequests: number
  upgradeCronSchedule: string
}

/** Values tests pass to override the environment, keyed like {@link Config}. */
export type ConfigOverrides = Partial<{
  [K in keyof Config]: Config[K] | string
}>
