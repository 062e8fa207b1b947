// =============================================================================
// TRACKWELL — Tracked Event Model
// =============================================================================

import { AuditFields } from '../services/audit-stamp';

export const EVENT_TYPES = ['NAVIGATION', 'ACTION'] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/** A navigation or action event recorded for, and owned by, one principal. */
export interface TrackedEvent extends AuditFields {
  id: string;
  /** Set once at creation from the authenticated principal; never from input */
  ownerId: string;
  type: EventType;
  from: string;
  to: string;
}

/** Client-controlled fields of an event */
export interface EventFields {
  type: EventType;
  from: string;
  to: string;
}

export function isEventType(value: unknown): value is EventType {
  return typeof value === 'string' && (EVENT_TYPES as readonly string[]).includes(value);
}
