import type { SchemaVariant } from "../normalize/types.js"
import type { Platform, TargetDescriptor, TargetKind } from "../schema/targets.js"

export type SortOrder = "Top" | "Latest"

/** Run-wide settings some actors take besides the targets themselves. */
export interface ActorInputOptions {
  downloadMedia: boolean
  sort: SortOrder
  lang: string | null
}

export interface ActorDefinition {
  readonly key: string
  readonly platform: Platform
  /** Apify actor id (or `user~name`). */
  readonly actorId: string
  readonly actorName: string
  readonly description: string
  /** Whether one run accepts several targets. Single-target actors get one job per target. */
  readonly multiTarget: boolean
  readonly targetKinds: readonly TargetKind[]
  readonly variant: SchemaVariant
  readonly defaultMemoryMb: number
  buildInput(targets: readonly TargetDescriptor[], options: ActorInputOptions): Record<string, unknown>
}

export interface PlatformModule {
  readonly name: Platform
  readonly displayName: string
  readonly defaultActorKey: string
  readonly actors: readonly ActorDefinition[]
  /** Reduces a URL, `@name` or bare name to the identifier actors expect. */
  normalizeTargetValue(kind: TargetKind, raw: string): string
}
