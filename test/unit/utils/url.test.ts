import {
  buildArrUrl,
  normalizeEndpointWithPath,
  withQuery,
} from '@utils/url.js'
import { describe, expect, it } from 'vitest'

describe('url', () => {
  describe('normalizeEndpointWithPath', () => {
    it('should drop trailing slashes', () => {
      expect(normalizeEndpointWithPath('http://server/api/')).toBe(
        'http://server/api',
      )
    })

    it('should assume http when the scheme is missing', () => {
      expect(normalizeEndpointWithPath('radarr:7878/')).toBe(
        'http://radarr:7878',
      )
    })

    it('should keep https and sub paths', () => {
      expect(normalizeEndpointWithPath('https://media.local/sonarr//')).toBe(
        'https://media.local/sonarr',
      )
    })

    it('should return an empty string for missing values', () => {
      expect(normalizeEndpointWithPath(undefined)).toBe('')
      expect(normalizeEndpointWithPath(null)).toBe('')
      expect(normalizeEndpointWithPath('')).toBe('')
    })
  })

  describe('buildArrUrl', () => {
    it('should join base, api path and segments with single slashes', () => {
      expect(buildArrUrl('http://radarr:7878/', '/api/v3/', 'movie', 12)).toBe(
        'http://radarr:7878/api/v3/movie/12',
      )
    })

    it('should keep a reverse-proxy sub path on the base URL', () => {
      expect(buildArrUrl('http://host/radarr', 'api/v3', 'qualityprofile')).toBe(
        'http://host/radarr/api/v3/qualityprofile',
      )
    })

    it('should tolerate an empty api path', () => {
      expect(buildArrUrl('http://host:8989', '', 'tag')).toBe(
        'http://host:8989/tag',
      )
    })
  })

  describe('withQuery', () => {
    it('should append defined parameters only', () => {
      expect(
        withQuery('http://sonarr:8989/api/v3/episode', {
          episodeFileId: 7,
          skipped: undefined,
        }),
      ).toBe('http://sonarr:8989/api/v3/episode?episodeFileId=7')
    })

    it('should stringify booleans and numbers', () => {
      expect(
        withQuery('http://sonarr:8989/api/v3/queue', {
          pageSize: 1000,
          includeSeries: true,
        }),
      ).toBe(
        'http://sonarr:8989/api/v3/queue?pageSize=1000&includeSeries=true',
      )
    })
  })
})
