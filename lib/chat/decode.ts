import { z } from 'zod';
import { DecodeError } from './errors';
import type { Message } from './types';

const RawMessageSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform((id) => String(id)),
  group_id: z.union([z.string().min(1), z.number().int()]).transform((id) => String(id)),
  sender_id: z.string().min(1),
  content: z.string().refine((value) => value.trim().length > 0, 'content must not be blank'),
  created_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'created_at must be a timestamp'),
  client_msg_id: z.string().nullish(),
});

export type RawMessage = z.input<typeof RawMessageSchema>;

/**
 * Validate a backend row and map it to a Message. Throws DecodeError.
 */
export function decodeMessage(row: unknown): Message {
  const parsed = RawMessageSchema.safeParse(row);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.') || 'row'}: ${e.message}`);
    throw new DecodeError(`Malformed message row (${issues.join('; ')})`, issues);
  }

  const data = parsed.data;
  return {
    id: data.id,
    conversationId: data.group_id,
    senderId: data.sender_id,
    content: data.content,
    createdAt: data.created_at,
    clientMsgId: data.client_msg_id ?? null,
  };
}
