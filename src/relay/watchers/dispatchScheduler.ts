import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { DispatchMode } from "../../config";
import type { Dispatcher } from "./dispatcher";

/**
 * Trigger a dispatch run on a cron schedule, alongside `POST /run-offers`.
 * Both go through the same Dispatcher, so they never overlap.
 */
export function startDispatchScheduler(
    dispatcher: Pick<Dispatcher, "run">,
    expression: string,
    mode: DispatchMode
): ScheduledTask {
    const task = cron.schedule(expression, async () => {
        try {
            const result = await dispatcher.run(mode);
            console.log(`[scheduler] Dispatch (${mode}) done:`, JSON.stringify(result));
        } catch (err) {
            console.error(`[scheduler] Dispatch (${mode}) failed:`, err);
        }
    });

    console.log(`[scheduler] Scheduler active, cron: "${expression}", mode: ${mode}`);
    return task;
}
