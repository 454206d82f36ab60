// =====================================================
// API Response Envelope
// =====================================================

import type { Request } from 'express';
import type { ApiResponse } from '@triviaduel/shared-types';

export function successResponse<T>(req: Request, data: T): ApiResponse<T> {
  return {
    success: true,
    data,
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };
}
