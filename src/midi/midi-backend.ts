/**
 * MIDI backend seam
 *
 * MixerInput talks to MIDI ports through this interface. Production uses
 * easymidi (RtMidi); tests plug in an in-process fake. easymidi is loaded
 * on demand because its native binding needs the host's MIDI library.
 */

import type * as Easymidi from 'easymidi';

export interface MidiControlChange {
  channel: number;     // 0-indexed
  controller: number;
  value: number;
}

export interface MidiNoteOn {
  channel: number;     // 0-indexed
  note: number;
  velocity: number;
}

export type MidiNoteOff = MidiNoteOn;

export interface MidiInputPort {
  onControlChange(listener: (msg: MidiControlChange) => void): void;
  onNoteOn(listener: (msg: MidiNoteOn) => void): void;
  onNoteOff(listener: (msg: MidiNoteOff) => void): void;
  close(): void;
}

export interface MidiBackend {
  listInputs(): string[];
  openInput(name: string): MidiInputPort;
}

export async function createEasymidiBackend(): Promise<MidiBackend> {
  let easymidi: typeof Easymidi;
  try {
    easymidi = await import('easymidi');
  } catch (error) {
    throw new Error(`MIDI support unavailable: ${error instanceof Error ? error.message : String(error)}`);
  }

  return {
    listInputs: () => easymidi.getInputs(),

    openInput: (name: string): MidiInputPort => {
      const input = new easymidi.Input(name);
      return {
        onControlChange: (listener) => {
          input.on('cc', (msg) => listener({ channel: msg.channel, controller: msg.controller, value: msg.value }));
        },
        onNoteOn: (listener) => {
          input.on('noteon', (msg) => listener({ channel: msg.channel, note: msg.note, velocity: msg.velocity }));
        },
        onNoteOff: (listener) => {
          input.on('noteoff', (msg) => listener({ channel: msg.channel, note: msg.note, velocity: msg.velocity }));
        },
        close: () => input.close(),
      };
    },
  };
}
