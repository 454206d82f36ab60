// =====================================================
// Matchmaking Schemas
// =====================================================

import { z } from 'zod';

// The rating always comes from the rating store; clients send nothing.
export const joinQueueSchema = z.object({}).strict();

export interface QueueLeaveResponse {
  removed: boolean;
}
