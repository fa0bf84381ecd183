import type { Platform } from "../schema/targets.js"
import { LinkedinPlatform } from "./linkedin/index.js"
import { TelegramPlatform } from "./telegram/index.js"
import type { ActorDefinition, PlatformModule } from "./types.js"
import { XPlatform } from "./x/index.js"

export const ALL_PLATFORM_MODULES = [new TelegramPlatform(), new XPlatform(), new LinkedinPlatform()] as const

export const getPlatformModule = (platform: Platform): PlatformModule => {
  const found = ALL_PLATFORM_MODULES.find((candidate) => candidate.name === platform)
  if (!found) {
    throw new Error(`Unknown platform: ${platform}`)
  }
  return found
}

export const actorKeysFor = (platform: Platform): string[] =>
  getPlatformModule(platform).actors.map((actor) => actor.key)

/** Throws naming the valid keys when `key` is not an actor of `platform`. */
export const getActor = (platform: Platform, key?: string): ActorDefinition => {
  const platformModule = getPlatformModule(platform)
  const actorKey = key ?? platformModule.defaultActorKey
  const actor = platformModule.actors.find((candidate) => candidate.key === actorKey)
  if (!actor) {
    throw new Error(`Unknown ${platformModule.displayName} actor "${actorKey}". Choose one of: ${actorKeysFor(platform).join(", ")}`)
  }
  return actor
}
