import type { TargetKind } from "../../schema/targets.js"
import type { PlatformModule } from "../types.js"
import { X_ACTORS } from "./actors.js"
import { normalizeHandle } from "./targets.js"

export class XPlatform implements PlatformModule {
  readonly name = "x" as const
  readonly displayName = "X"
  readonly defaultActorKey = "ppr"
  readonly actors = X_ACTORS

  normalizeTargetValue(kind: TargetKind, raw: string): string {
    return kind === "handle" ? normalizeHandle(raw) : raw.trim()
  }
}
