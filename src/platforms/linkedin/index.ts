import type { TargetKind } from "../../schema/targets.js"
import type { PlatformModule } from "../types.js"
import { LINKEDIN_ACTORS } from "./actors.js"
import { normalizeProfile } from "./targets.js"

export class LinkedinPlatform implements PlatformModule {
  readonly name = "linkedin" as const
  readonly displayName = "LinkedIn"
  readonly defaultActorKey = "profile_posts"
  readonly actors = LINKEDIN_ACTORS

  normalizeTargetValue(_kind: TargetKind, raw: string): string {
    return normalizeProfile(raw)
  }
}
