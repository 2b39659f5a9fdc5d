/**
 * Test fakes: a capturing pino logger and an in-process MIDI backend.
 */

import pino, { Logger } from 'pino';
import { MidiBackend, MidiControlChange, MidiInputPort, MidiNoteOff, MidiNoteOn } from '../midi/midi-backend';
import { ControlChangeEvent, NoteEvent, NoteOffEvent } from '../types';

export interface LogLine {
  level: number;
  module?: string;
  msg: string;
}

export interface CapturedLogger {
  logger: Logger;
  lines: LogLine[];
}

/** pino logger writing parsed JSON lines into an array */
export function captureLogger(level: pino.LevelWithSilent = 'debug'): CapturedLogger {
  const lines: LogLine[] = [];
  const logger = pino({ level }, {
    write(chunk: string) {
      const entry: LogLine = JSON.parse(chunk);
      lines.push({ level: entry.level, module: entry.module, msg: entry.msg });
    },
  });
  return { logger, lines };
}

export const silentLogger: Logger = pino({ level: 'silent' });

export const WARN = 40;

export function cc(controller: number, value: number): ControlChangeEvent {
  return { type: 'cc', controller, value };
}

export function note(n: number, velocity: number): NoteEvent {
  return { type: 'note', note: n, velocity };
}

export function noteOff(n: number, velocity = 0): NoteOffEvent {
  return { type: 'noteOff', note: n, velocity };
}

// --- Fake MIDI backend ---

export class FakeMidiPort implements MidiInputPort {
  closed = false;
  private ccListeners: Array<(msg: MidiControlChange) => void> = [];
  private noteListeners: Array<(msg: MidiNoteOn) => void> = [];
  private noteOffListeners: Array<(msg: MidiNoteOff) => void> = [];

  constructor(readonly name: string) {}

  onControlChange(listener: (msg: MidiControlChange) => void): void {
    this.ccListeners.push(listener);
  }

  onNoteOn(listener: (msg: MidiNoteOn) => void): void {
    this.noteListeners.push(listener);
  }

  onNoteOff(listener: (msg: MidiNoteOff) => void): void {
    this.noteOffListeners.push(listener);
  }

  close(): void {
    this.closed = true;
  }

  sendCC(controller: number, value: number, channel = 0): void {
    for (const l of this.ccListeners) l({ channel, controller, value });
  }

  sendNoteOn(n: number, velocity: number, channel = 0): void {
    for (const l of this.noteListeners) l({ channel, note: n, velocity });
  }

  sendNoteOff(n: number, velocity = 0, channel = 0): void {
    for (const l of this.noteOffListeners) l({ channel, note: n, velocity });
  }
}

export class FakeMidiBackend implements MidiBackend {
  inputs: string[];
  opened: FakeMidiPort[] = [];
  openError: Error | null = null;
  listError: Error | null = null;

  constructor(inputs: string[] = []) {
    this.inputs = inputs;
  }

  listInputs(): string[] {
    if (this.listError) throw this.listError;
    return [...this.inputs];
  }

  openInput(name: string): MidiInputPort {
    if (this.openError) throw this.openError;
    const port = new FakeMidiPort(name);
    this.opened.push(port);
    return port;
  }

  /** Most recently opened port */
  get lastPort(): FakeMidiPort {
    const port = this.opened[this.opened.length - 1];
    if (!port) throw new Error('No port opened');
    return port;
  }
}

export const DJM850_PORT = 'DJM-850:DJM-850 MIDI 1 24:0';
export const DJM750_PORT = 'DJM-750:DJM-750 MIDI 1 24:0';
export const MIDI_THROUGH_PORT = 'Midi Through:Midi Through Port-0 14:0';
