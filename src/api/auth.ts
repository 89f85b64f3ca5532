import crypto from "crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";

function safeEqual(a: string, b: string): boolean {
    const left = Buffer.from(a);
    const right = Buffer.from(b);
    return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/**
 * Path-secret guard for the Telegram webhook.
 * Rejects with 403 unless `:secret` equals the configured webhook secret.
 */
export function webhookSecretGuard(secret: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!safeEqual(req.params.secret ?? "", secret)) {
            console.warn("[webhook] Rejected update with invalid secret");
            res.status(403).json({ detail: "Invalid secret" });
            return;
        }
        next();
    };
}
