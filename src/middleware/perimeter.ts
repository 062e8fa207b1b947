// =============================================================================
// TRACKWELL — Perimeter Status Mapping
//
// Turns authorization denials into HTTP responses:
//   unauthenticated → 401, forbidden → 403, not_found → 404
// =============================================================================

import { Response } from 'express';
import { Denial } from '../types/authorization';

export function sendDenial(res: Response, denial: Denial): void {
  switch (denial.denialReason) {
    case 'unauthenticated':
      res.status(401).json({ error: 'Authentication required' });
      return;
    case 'not_found':
      res.status(404).json({ error: 'Resource not found', resourceId: denial.resourceId });
      return;
    case 'forbidden':
      res.status(403).json({
        error: 'Access denied: resource belongs to another principal',
        resourceId: denial.resourceId,
      });
      return;
  }
}
