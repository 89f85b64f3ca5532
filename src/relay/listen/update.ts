import { z } from "zod";

// Only the fields the relay reads; everything else Telegram sends passes through untouched.
const entitySchema = z
    .object({
        type: z.string(),
        url: z.string().optional(),
    })
    .passthrough();

const messageSchema = z
    .object({
        from: z.object({ id: z.number() }).passthrough().optional(),
        chat: z.object({ id: z.union([z.number(), z.string()]) }).passthrough().optional(),
        text: z.string().optional(),
        caption: z.string().optional(),
        entities: z.array(entitySchema).optional(),
        caption_entities: z.array(entitySchema).optional(),
    })
    .passthrough();

export const telegramUpdateSchema = z
    .object({
        update_id: z.number().optional(),
        message: messageSchema.nullish(),
        edited_message: messageSchema.nullish(),
    })
    .passthrough();

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramMessageEntity = z.infer<typeof entitySchema>;
