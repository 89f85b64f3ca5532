import { Router, type Request, type Response } from "express";
import type { DispatchMode } from "../../config";
import type { Dispatcher } from "../../relay/watchers/dispatcher";

/**
 * POST /run-offers
 * Runs one dispatch cycle. Meant to be hit by an external scheduler.
 */
export function createRunOffersRouter(dispatcher: Dispatcher, mode: DispatchMode): Router {
    const router = Router();

    router.post("/", async (_req: Request, res: Response) => {
        try {
            const result = await dispatcher.run(mode);
            res.json({ ok: true, result });
        } catch (err) {
            const msg = err instanceof Error ? err.message : String(err);
            console.error(`[run-offers] Execution failed: ${msg}`);
            res.status(500).json({ ok: false, error: msg });
        }
    });

    return router;
}
