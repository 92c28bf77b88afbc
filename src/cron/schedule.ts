// src/cron/schedule.ts — Cron-driven retirement runs with overrun protection

import { Cron } from "croner"

export interface ScheduleOptions {
  expression: string
  /** IANA zone name; empty means the host's local zone */
  timezone?: string
}

export interface RetirementSchedule {
  readonly expression: string
  /** Next fire time, or null if the expression never fires again */
  nextRun(): Date | null
  /** True while a triggered run has not finished */
  isBusy(): boolean
  stop(): void
}

function cronOptions(opts: ScheduleOptions): { timezone?: string } {
  return opts.timezone ? { timezone: opts.timezone } : {}
}

/**
 * Validate a cron expression (and time zone) up front.
 * Throws with the parser's message on anything croner rejects.
 */
export function validateSchedule(opts: ScheduleOptions): void {
  try {
    const trial = new Cron(opts.expression, { ...cronOptions(opts), paused: true })
    trial.nextRun()
    trial.stop()
  } catch (err) {
    throw new Error(
      `Invalid schedule "${opts.expression}"${opts.timezone ? ` (${opts.timezone})` : ""}: ${err instanceof Error ? err.message : String(err)}`,
    )
  }
}

/**
 * Fire `task` on every tick. A tick that arrives while the previous run is
 * still active is skipped and logged.
 */
export function startRetirementSchedule(
  opts: ScheduleOptions,
  task: () => Promise<unknown>,
): RetirementSchedule {
  validateSchedule(opts)

  let busy = false
  const job = new Cron(
    opts.expression,
    {
      ...cronOptions(opts),
      protect: () => {
        console.warn("[schedule] previous retirement run still active, skipping this tick")
      },
    },
    async () => {
      busy = true
      console.log("[schedule] tick: starting retirement run")
      try {
        await task()
      } catch (err) {
        console.error("[schedule] retirement run failed:", err)
      } finally {
        busy = false
        const next = job.nextRun()
        if (next) console.log(`[schedule] next run at ${next.toISOString()}`)
      }
    },
  )

  const first = job.nextRun()
  console.log(`[schedule] armed "${opts.expression}"${first ? `, first run at ${first.toISOString()}` : ""}`)

  return {
    expression: opts.expression,
    nextRun: () => job.nextRun(),
    isBusy: () => busy,
    stop: () => {
      job.stop()
      console.log("[schedule] stopped")
    },
  }
}
