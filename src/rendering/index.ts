import { InteractiveRenderer } from "./interactive.js"
import { PlainRenderer } from "./plain.js"
import type { CliRenderer } from "./types.js"

export * from "./types.js"

/** Spinners and colors only on a terminal; `--plain` or piped output gets line logs. */
export const createRenderer = (options: { plain: boolean; isTTY: boolean }): CliRenderer =>
  options.plain || !options.isTTY ? new PlainRenderer() : new InteractiveRenderer()
