// =====================================================
// Match Schemas
// =====================================================

import { z } from 'zod';

export const matchIdParamsSchema = z.object({
  matchId: z.string().trim().min(1).max(100),
});
