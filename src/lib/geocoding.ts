/**
 * Reverse geocoding: describe a coordinate pair as a place name
 * using OpenStreetMap Nominatim.
 */
import { Logger } from './logger'

const log = new Logger('geocoding')

export interface ReverseGeocoder {
  /** Best effort: resolves null instead of rejecting. */
  describe(lat: number, lon: number): Promise<string | null>
}

export async function reverseGeocode(lat: number, lon: number, timeoutMs: number): Promise<string | null> {
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null

  const url = `https://nominatim.openstreetmap.org/reverse?lat=${lat}&lon=${lon}&format=json&zoom=14&addressdetails=0`
  const res = await fetch(url, {
    headers: { 'User-Agent': 'media-chronicle/0.1' },
    signal: AbortSignal.timeout(timeoutMs),
  })

  if (!res.ok) throw new Error(`Nominatim ${res.status}`)

  const data: unknown = await res.json()
  if (typeof data !== 'object' || data === null || !('display_name' in data)) return null
  return typeof data.display_name === 'string' && data.display_name.trim() ? data.display_name : null
}

export function createNominatimGeocoder(timeoutMs: number): ReverseGeocoder {
  return {
    async describe(lat, lon) {
      try {
        return await reverseGeocode(lat, lon, timeoutMs)
      } catch (err) {
        log.debug(`Reverse lookup failed for ${lat},${lon}:`, err instanceof Error ? err.message : err)
        return null
      }
    },
  }
}
