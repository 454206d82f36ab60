// =====================================================
// Inbound Message Schemas
// =====================================================
// Every client frame is validated here once; handlers receive typed data.

import { z } from 'zod';

const emptyData = z.object({}).default({});

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('AUTHENTICATE'),
    data: z.object({ token: z.string().min(1) }),
  }),
  z.object({
    type: z.literal('START_MATCHMAKING'),
    data: emptyData,
  }),
  z.object({
    type: z.literal('CANCEL_MATCHMAKING'),
    data: emptyData,
  }),
  z.object({
    type: z.literal('SUBMIT_ANSWER'),
    data: z.object({
      playerId: z.string().min(1),
      matchId: z.string().min(1),
      round: z.number().int().positive(),
      answer: z.string().max(500),
      timestamp: z.number().optional(),
    }),
  }),
  z.object({
    type: z.literal('FORFEIT'),
    data: z.object({ matchId: z.string().min(1) }),
  }),
  z.object({
    type: z.literal('SYNC_STATE'),
    data: z.object({ matchId: z.string().min(1) }),
  }),
]);

export type InboundMessage = z.infer<typeof clientMessageSchema>;

/**
 * Parse a raw frame. Text frames are decoded as JSON first.
 */
export function parseClientMessage(raw: unknown) {
  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch {
      candidate = null;
    }
  }
  return clientMessageSchema.safeParse(candidate);
}
