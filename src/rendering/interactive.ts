import boxen from "boxen"
import chalk from "chalk"
import Table from "cli-table3"
import ora from "ora"

import type { ExportOutcome } from "../export/index.js"
import type { RunResult, TargetOutcome } from "../pipeline/types.js"
import { describeTarget } from "../schema/targets.js"
import { exportRow, skippedLine, targetRow } from "./format.js"
import type { CliRenderer, RunHeader, ServiceStatus, SpinnerHandle } from "./types.js"

export class InteractiveRenderer implements CliRenderer {
  header(info: RunHeader): void {
    const body = [
      `${chalk.bold("Run ID")}    ${info.runId}${info.resumed ? chalk.yellow(" (resumed)") : ""}`,
      `${chalk.bold("Platform")}  ${info.platform}`,
      `${chalk.bold("Actor")}     ${info.actorName}`,
      `${chalk.bold("Backend")}   ${info.backend}`,
      `${chalk.bold("Targets")}   ${info.targetCount}`,
      `${chalk.bold("Output")}    ${info.outputs.join("\n          ")}`,
    ].join("\n")

    console.log(
      boxen(body, {
        title: chalk.bold("social-scrape"),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  envTable(services: ServiceStatus[]): void {
    const table = new Table({
      head: [chalk.bold("Service"), chalk.bold("Status")],
    })

    for (const service of services) {
      let status: string
      if (service.ready) {
        status = chalk.green("ready")
      } else if (service.required) {
        status = chalk.red("missing (required)")
      } else {
        status = chalk.gray("not configured")
      }
      table.push([service.name, status])
    }

    console.log(table.toString())
  }

  createSpinner(text: string): SpinnerHandle {
    const spinner = ora(text).start()
    return {
      update(nextText) {
        spinner.text = nextText
      },
      succeed(finalText) {
        spinner.succeed(finalText)
      },
      fail(finalText) {
        spinner.fail(finalText)
      },
      warn(finalText) {
        spinner.warn(finalText)
      },
    }
  }

  targetDone(outcome: TargetOutcome): void {
    const name = describeTarget(outcome.target)
    if (outcome.status === "failed") {
      console.log(chalk.red(`[ERR] ${name} - ${outcome.failure.code}: ${outcome.failure.message}`))
      if (outcome.failure.logTail) {
        console.log(chalk.gray(outcome.failure.logTail))
      }
      return
    }
    const suffix = outcome.resumed ? " (from history)" : ""
    console.log(chalk.green(`[OK] ${name} - ${outcome.recordCount} records${suffix}`))
  }

  exportDone(outcome: ExportOutcome): void {
    if (outcome.status === "failed") {
      console.log(chalk.red(`[ERR] ${outcome.format} export - ${outcome.error.message}`))
      return
    }
    console.log(chalk.green(`[OK] ${outcome.format} - ${outcome.count} records written to ${outcome.path}`))
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(chalk.gray(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`))
  }

  runSummary(result: RunResult, elapsedSeconds: number): void {
    const targets = new Table({
      head: ["Target", "Status", "Job", "Records", "Error"].map((title) => chalk.bold(title)),
    })
    for (const outcome of result.targets) {
      const [name, status, job, records, error] = targetRow(outcome)
      targets.push([name, outcome.status === "failed" ? chalk.red(status) : chalk.green(status), job, records, error])
    }
    console.log(targets.toString())

    if (result.exports.length > 0) {
      const exports = new Table({
        head: ["Format", "Path", "Status"].map((title) => chalk.bold(title)),
      })
      for (const outcome of result.exports) {
        const [format, path, status] = exportRow(outcome)
        exports.push([format, path, outcome.status === "written" ? chalk.green(status) : chalk.red(status)])
      }
      console.log(exports.toString())
    }

    const skipped = skippedLine(result)
    if (skipped) {
      console.log(chalk.gray(skipped))
    }
    for (const sample of result.invalidSamples) {
      console.log(chalk.gray(`  ${sample}`))
    }

    const failed = result.targets.some((outcome) => outcome.status === "failed") ||
      result.exports.some((outcome) => outcome.status === "failed")
    console.log(
      boxen(
        `${chalk.bold("Duration")}    ${elapsedSeconds}s\n${chalk.bold("Records")}     ${result.collection.length}`,
        {
          title: failed ? chalk.yellow("Run finished with errors") : chalk.green("Run complete"),
          borderColor: failed ? "yellow" : "green",
          padding: 1,
        },
      ),
    )
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    console.error(chalk.red(message))
  }
}
