import cron, { type ScheduledTask } from "node-cron"
import type { ShelterSyncRunner } from "./shelter-sync"

async function runNightlySync(runner: ShelterSyncRunner) {
    console.log("[CRON] Starting shelter sync...")
    try {
        const summary = await runner.run()
        if (summary) {
            console.log(`[CRON] Shelter sync complete (completed=${summary.completed}, deleted=${summary.deleted})`)
        }
    } catch (error) {
        console.error("[CRON] Error during shelter sync:", error)
    }
}

export function startScheduledJobs(runner: ShelterSyncRunner, schedule: { cron: string; timezone: string }): ScheduledTask[] {
    console.log("[CRON] Starting scheduled jobs...")

    if (!cron.validate(schedule.cron)) {
        console.error(`[CRON] Invalid SYNC_CRON expression "${schedule.cron}", shelter sync not scheduled`)
        return []
    }

    // Reconcile shelters against BBR every night (03:00 Copenhagen by default)
    const task = cron.schedule(schedule.cron, () => runNightlySync(runner), {
        timezone: schedule.timezone
    })

    return [task]
}
