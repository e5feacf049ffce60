import { z } from 'zod';

export const TextMessageSchema = z.object({
  text: z.string().min(1).max(4000),
});

export type TextMessageRequest = z.infer<typeof TextMessageSchema>;

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

export const ImageMessageSchema = z.object({
  data: z.string().min(1).regex(BASE64, 'data must be base64'),
  mimeType: z.enum(['image/jpeg', 'image/png', 'image/webp']),
});

export type ImageMessageRequest = z.infer<typeof ImageMessageSchema>;

export interface MessageReply {
  kind:
    | 'confirmed'
    | 'rejected'
    | 'failed'
    | 'listing'
    | 'summary'
    | 'cancel_forwarded'
    | 'help'
    | 'unreadable';
  text: string;
}
