import { mkdir, rename, rm, writeFile } from "node:fs/promises"
import { dirname } from "node:path"

import { throwIfAborted } from "../utils/cancel.js"

export const tempPathFor = (destination: string): string => `${destination}.${process.pid}.tmp`

/**
 * Writes to `<destination>.<pid>.tmp` and renames it over `destination`, so readers
 * never see a half-written file. Parent directories are created.
 */
export const writeFileAtomic = async (
  destination: string,
  data: string | Uint8Array,
  signal?: AbortSignal,
): Promise<void> => {
  await mkdir(dirname(destination), { recursive: true })
  const tempPath = tempPathFor(destination)
  try {
    await writeFile(tempPath, data)
    throwIfAborted(signal)
    await rename(tempPath, destination)
  } catch (error) {
    await rm(tempPath, { force: true }).catch(() => undefined)
    throw error
  }
}
