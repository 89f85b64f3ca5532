import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { Dispatcher } from "../dispatcher";
import { startDispatchScheduler } from "../dispatchScheduler";

const { schedule } = vi.hoisted(() => ({ schedule: vi.fn() }));

vi.mock("node-cron", () => ({ default: { schedule } }));

describe("startDispatchScheduler", () => {
    const task = { stop: vi.fn() };
    let tick: () => Promise<void>;
    let run: Mock<Dispatcher["run"]>;

    beforeEach(() => {
        schedule.mockReset();
        schedule.mockImplementation((_expr: string, fn: () => Promise<void>) => {
            tick = fn;
            return task;
        });
        run = vi.fn<Dispatcher["run"]>();
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    function start(mode: "queue" | "search") {
        return startDispatchScheduler({ run }, "*/15 * * * *", mode);
    }

    it("registers the expression and returns the task", () => {
        expect(start("queue")).toBe(task);
        expect(schedule).toHaveBeenCalledWith("*/15 * * * *", expect.any(Function));
    });

    it("runs the dispatcher in the configured mode on each tick", async () => {
        run.mockResolvedValue({ sent: 0, failed: 0, candidates: 0, titles: [] });
        start("search");

        await tick();

        expect(run).toHaveBeenCalledWith("search");
        expect(console.error).not.toHaveBeenCalled();
    });

    it("logs a failed run instead of throwing", async () => {
        const boom = new Error("TELEGRAM_BOT_TOKEN não definido");
        run.mockRejectedValue(boom);
        start("queue");

        await expect(tick()).resolves.toBeUndefined();
        expect(console.error).toHaveBeenCalledWith("[scheduler] Dispatch (queue) failed:", boom);
    });
});
