/**
 * Platform client factory
 * Creates the appropriate platform client based on type
 */

import { IPlatformClient, PlatformType } from './types'
import { DiscordPlatformClient } from './discord/client'

export const PLATFORM_TYPES: readonly PlatformType[] = ['discord']

export function isPlatformType(value: string): value is PlatformType {
  return PLATFORM_TYPES.some((type) => type === value)
}

/**
 * Create a platform client instance
 */
export function createPlatformClient(type: PlatformType): IPlatformClient {
  switch (type) {
    case 'discord':
      return new DiscordPlatformClient()

    default:
      throw new Error(`Unknown platform type: ${String(type)}`)
  }
}
