import express, { Router, type NextFunction, type Request, type Response } from "express";
import { webhookSecretGuard } from "../auth";
import { handleUpdate, type InboundDeps } from "../../relay/listen/inbound";
import { telegramUpdateSchema } from "../../relay/listen/update";

/**
 * POST /telegram/webhook/:secret
 * Telegram pushes bot updates here; store links in the message are queued.
 */
export function createTelegramWebhookRouter(deps: InboundDeps & { secret: string }): Router {
    const router = Router();

    // The body is only parsed once the secret has been checked.
    const parseBody = express.json({ limit: "512kb" });

    router.post("/:secret", webhookSecretGuard(deps.secret), parseBody, async (req: Request, res: Response) => {
        const parsed = telegramUpdateSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ ok: false, error: "Invalid update payload" });
            return;
        }

        try {
            res.json(await handleUpdate(parsed.data, deps));
        } catch (err) {
            const msg = err instanceof Error ? err.message : String(err);
            console.error("[webhook] Failed to process update:", err);
            res.status(500).json({ ok: false, error: msg });
        }
    });

    // Malformed JSON from the body parser
    router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({ ok: false, error: "Invalid update payload" });
            return;
        }
        next(err);
    });

    return router;
}
