import type { TargetKind } from "../../schema/targets.js"
import type { PlatformModule } from "../types.js"
import { TELEGRAM_ACTORS } from "./actors.js"
import { normalizeChannel } from "./targets.js"

export class TelegramPlatform implements PlatformModule {
  readonly name = "telegram" as const
  readonly displayName = "Telegram"
  readonly defaultActorKey = "media"
  readonly actors = TELEGRAM_ACTORS

  normalizeTargetValue(_kind: TargetKind, raw: string): string {
    return normalizeChannel(raw)
  }
}
