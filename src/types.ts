/**
 * Shared types for the mixer-to-Pro DJ Link bridge.
 */

// --- Mixer events (already decoded from MIDI) ---

export interface ControlChangeEvent {
  type: 'cc';
  controller: number;  // control address
  value: number;       // 0-127
}

export interface NoteEvent {
  type: 'note';
  note: number;
  velocity: number;    // 0-127, 0 = released
}

/** Drives nothing, but still counts as the previous event */
export interface NoteOffEvent {
  type: 'noteOff';
  note: number;
  velocity: number;
}

export type MixerEvent = ControlChangeEvent | NoteEvent | NoteOffEvent;

// --- Mixer profiles ---

/**
 * Control addresses for one mixer model. Pure data: the fader engine is
 * generic over it.
 */
export interface MixerProfile {
  readonly model: string;
  readonly channelCount: 2 | 4;
  readonly crossFaderAddr: number;
  readonly channelFaderBaseAddr: number;
  /** 2-channel models drive both assignments from one mirrored control */
  readonly crossFaderAssignBaseAddr: number;
  /** Channel fader curve control. Absent = fixed threshold */
  readonly channelFaderSlopeAddr?: number;
  /** Note of the channel 1 fader-start button. Absent = no fader-start packets */
  readonly faderStartNoteBase?: number;
}

// --- Outbound packets ---

export type PacketKind = 'onAir' | 'faderStart';

export interface OutboundPacket {
  kind: PacketKind;
  data: Buffer;
}
