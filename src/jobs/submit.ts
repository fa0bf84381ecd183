import { SubmissionError } from "../errors.js"
import type { ActorDefinition, ActorInputOptions } from "../platforms/types.js"
import { type TargetDescriptor, validateTarget } from "../schema/targets.js"
import { isCancellationError } from "../utils/cancel.js"
import { HttpError } from "../utils/http.js"
import { getErrorMessage, sanitizeForError } from "../utils/sanitize.js"
import type { Job, RunStarter } from "./types.js"

export interface SubmitOptions {
  input: ActorInputOptions
  memoryMb?: number
  signal?: AbortSignal
  now?: () => Date
}

/** Multi-target actors take the whole list in one run; the others get one run per target. */
export const planBatches = (multiTarget: boolean, targets: readonly TargetDescriptor[]): TargetDescriptor[][] => {
  if (targets.length === 0) {
    return []
  }
  return multiTarget ? [[...targets]] : targets.map((target) => [target])
}

const checkTargetsFit = (actor: ActorDefinition, targets: readonly TargetDescriptor[]): void => {
  if (targets.length === 0) {
    throw new SubmissionError("invalid-target", `No targets to submit to actor "${actor.key}"`)
  }
  if (!actor.multiTarget && targets.length > 1) {
    throw new SubmissionError("invalid-target", `Actor "${actor.key}" accepts one target per run, got ${targets.length}`)
  }
  for (const target of targets) {
    validateTarget(target)
    if (target.platform !== actor.platform) {
      throw new SubmissionError(
        "invalid-target",
        `Target "${target.value}" is a ${target.platform} target, actor "${actor.key}" scrapes ${actor.platform}`,
      )
    }
    if (!actor.targetKinds.includes(target.kind)) {
      throw new SubmissionError(
        "invalid-target",
        `Actor "${actor.key}" does not take ${target.kind} targets (accepts: ${actor.targetKinds.join(", ")})`,
      )
    }
  }
}

const toSubmissionError = (error: unknown, actor: ActorDefinition): SubmissionError => {
  const message = sanitizeForError(getErrorMessage(error))
  if (error instanceof HttpError && error.status !== null) {
    if (error.status === 401 || error.status === 403) {
      return new SubmissionError("auth", `Actor "${actor.key}" refused the credentials: ${message}`, { cause: error })
    }
    if (error.status === 400 || error.status === 404 || error.status === 422) {
      return new SubmissionError("invalid-target", `Actor "${actor.key}" rejected the input: ${message}`, {
        cause: error,
      })
    }
  }
  return new SubmissionError("rejected", `Could not start actor "${actor.key}": ${message}`, { cause: error })
}

/**
 * Validates the batch, starts one remote run and returns its job in `queued`.
 * Rejections are final; transient transport failures are retried by the client.
 */
export const submitJob = async (
  client: RunStarter,
  actor: ActorDefinition,
  targets: readonly TargetDescriptor[],
  options: SubmitOptions,
): Promise<Job> => {
  checkTargetsFit(actor, targets)
  const input = actor.buildInput(targets, options.input)

  let started: Awaited<ReturnType<RunStarter["startRun"]>>
  try {
    started = await client.startRun(actor.actorId, input, {
      memoryMb: options.memoryMb ?? actor.defaultMemoryMb,
      signal: options.signal,
    })
  } catch (error) {
    if (isCancellationError(error)) {
      throw error
    }
    throw toSubmissionError(error, actor)
  }

  if (!started.remoteRunId) {
    throw new SubmissionError("rejected", `Actor "${actor.key}" returned no run id`)
  }

  return {
    id: `${actor.platform}:${actor.key}:${started.remoteRunId}`,
    platform: actor.platform,
    actorKey: actor.key,
    targets: [...targets],
    remoteRunId: started.remoteRunId,
    status: "queued",
    submittedAt: (options.now ?? (() => new Date()))(),
    datasetId: started.datasetId,
    remoteStatus: started.remoteStatus,
    statusMessage: null,
  }
}
