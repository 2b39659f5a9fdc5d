/**
 * Mixer Profile Table
 *
 * MIDI control addresses per supported mixer model. Lookup is by the
 * model name the mixer reports as its MIDI client name.
 */

import { MixerProfile } from './types';

const PROFILES: readonly MixerProfile[] = [
  {
    model: 'DJM-250MK2',
    channelCount: 2,
    crossFaderAddr: 0x0b,
    channelFaderBaseAddr: 0x11,
    crossFaderAssignBaseAddr: 0x60,
  },
  {
    model: 'DJM-450',
    channelCount: 2,
    crossFaderAddr: 0x0b,
    channelFaderBaseAddr: 0x11,
    crossFaderAssignBaseAddr: 0x60,
  },
  {
    model: 'DJM-750',
    channelCount: 4,
    crossFaderAddr: 0x0b,
    channelFaderBaseAddr: 0x11,
    crossFaderAssignBaseAddr: 0x41,
    channelFaderSlopeAddr: 0x5e,
  },
  {
    model: 'DJM-750MK2',
    channelCount: 4,
    crossFaderAddr: 0x0b,
    channelFaderBaseAddr: 0x11,
    crossFaderAssignBaseAddr: 0x41,
    channelFaderSlopeAddr: 0x5e,
  },
  {
    model: 'DJM-850',
    channelCount: 4,
    crossFaderAddr: 0x0b,
    channelFaderBaseAddr: 0x11,
    crossFaderAssignBaseAddr: 0x41,
    channelFaderSlopeAddr: 0x5e,
    faderStartNoteBase: 0x66,
  },
];

/**
 * Strip the port part from a MIDI port name.
 * "DJM-850:DJM-850 MIDI 1 24:0" -> "DJM-850"
 */
export function deviceLabel(portName: string): string {
  const colon = portName.indexOf(':');
  return (colon >= 0 ? portName.slice(0, colon) : portName).trim();
}

/**
 * Resolve a device label (or full port name) to its profile.
 * Returns undefined for unsupported devices.
 */
export function lookupProfile(label: string): MixerProfile | undefined {
  return PROFILES.find((p) => p.model === label)
    ?? PROFILES.find((p) => p.model === deviceLabel(label));
}

export function listProfiles(): readonly MixerProfile[] {
  return PROFILES;
}
