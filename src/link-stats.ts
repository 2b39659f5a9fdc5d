/**
 * Counters for the running link
 *
 * Updated by OnAirLink from its own event handlers.
 */

import { PacketKind } from './types';

export interface LinkStats {
  deviceLabel: string | null;
  attached: boolean;
  attachCount: number;
  lastAttachedAt: number | null;
  lastDetachedAt: number | null;
  eventsHandled: number;
  packetsSent: Record<PacketKind, number>;
  sendErrors: number;
  lastError: string | null;
  lastErrorAt: number | null;
}

export function createLinkStats(): LinkStats {
  return {
    deviceLabel: null,
    attached: false,
    attachCount: 0,
    lastAttachedAt: null,
    lastDetachedAt: null,
    eventsHandled: 0,
    packetsSent: { onAir: 0, faderStart: 0 },
    sendErrors: 0,
    lastError: null,
    lastErrorAt: null,
  };
}

export function formatLinkStats(stats: LinkStats): string {
  const device = stats.deviceLabel ?? 'none';
  return `device=${device} attaches=${stats.attachCount} events=${stats.eventsHandled} ` +
    `onAir=${stats.packetsSent.onAir} faderStart=${stats.packetsSent.faderStart} errors=${stats.sendErrors}`;
}
