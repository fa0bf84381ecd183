import type { ExportOutcome } from "../export/index.js"
import type { RunResult, TargetOutcome } from "../pipeline/types.js"
import { exportRow, skippedLine, targetRow } from "./format.js"
import type { CliRenderer, RunHeader, ServiceStatus, SpinnerHandle } from "./types.js"

export class PlainRenderer implements CliRenderer {
  header(info: RunHeader): void {
    console.log("=== social-scrape ===")
    console.log(`Run ID:   ${info.runId}${info.resumed ? " (resumed)" : ""}`)
    console.log(`Platform: ${info.platform}`)
    console.log(`Actor:    ${info.actorName}`)
    console.log(`Backend:  ${info.backend}`)
    console.log(`Targets:  ${info.targetCount}`)
    for (const output of info.outputs) {
      console.log(`Output:   ${output}`)
    }
    console.log("")
  }

  envTable(services: ServiceStatus[]): void {
    console.log("Service         Status")
    for (const service of services) {
      let status: string
      if (service.ready) {
        status = "ready"
      } else if (service.required) {
        status = "missing (required)"
      } else {
        status = "not configured"
      }
      console.log(`${service.name.padEnd(15)} ${status}`)
    }
    console.log("")
  }

  createSpinner(text: string): SpinnerHandle {
    console.log(text)
    let lastText = text
    const finish = (label: string, finalText?: string) => {
      console.log(`[${label}] ${finalText ?? lastText}`)
    }
    return {
      update(nextText) {
        // Plain output only logs changes.
        if (nextText !== lastText) {
          lastText = nextText
          console.log(`  ${nextText}`)
        }
      },
      succeed(finalText) {
        finish("OK", finalText)
      },
      fail(finalText) {
        finish("ERR", finalText)
      },
      warn(finalText) {
        finish("WARN", finalText)
      },
    }
  }

  targetDone(outcome: TargetOutcome): void {
    const [name, , , records, error] = targetRow(outcome)
    if (outcome.status === "failed") {
      console.log(`[ERR] ${name} - ${error}`)
      if (outcome.failure.logTail) {
        console.log(outcome.failure.logTail)
      }
      return
    }
    console.log(`[OK] ${name} - ${records} records${outcome.resumed ? " (from history)" : ""}`)
  }

  exportDone(outcome: ExportOutcome): void {
    const [format, path, status] = exportRow(outcome)
    console.log(`[${outcome.status === "written" ? "OK" : "ERR"}] ${format} ${path} - ${status}`)
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`)
  }

  runSummary(result: RunResult, elapsedSeconds: number): void {
    console.log("")
    console.log("Targets:")
    for (const outcome of result.targets) {
      const [name, status, job, records, error] = targetRow(outcome)
      console.log(`  ${name.padEnd(30)} ${status.padEnd(8)} job=${job} records=${records}${error ? ` ${error}` : ""}`)
    }
    if (result.exports.length > 0) {
      console.log("Exports:")
      for (const outcome of result.exports) {
        const [format, path, status] = exportRow(outcome)
        console.log(`  ${format.padEnd(5)} ${path} ${status}`)
      }
    }
    const skipped = skippedLine(result)
    if (skipped) {
      console.log(skipped)
    }
    for (const sample of result.invalidSamples) {
      console.log(`  ${sample}`)
    }
    console.log(`Done in ${elapsedSeconds}s, ${result.collection.length} records`)
  }

  warn(message: string): void {
    console.warn(message)
  }

  error(message: string): void {
    console.error(message)
  }
}
