/**
 * Mixer Input
 *
 * Finds the mixer among the MIDI inputs, follows it across USB unplug
 * and replug, and decodes its messages into MixerEvents.
 *
 * Port lists are polled: RtMidi gives no hot-plug notification, so a
 * vanished port is only noticed on the next poll.
 *
 * Emits:
 *   'attached'   (label: string)      mixer port opened
 *   'detached'   (label: string)      mixer port gone
 *   'event'      (event: MixerEvent)
 *   'error'      (err: Error)         port list unreadable, or port could not
 *                                     be opened (once per port until it opens)
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { deviceLabel, lookupProfile } from '../mixer-profiles';
import { MixerEvent } from '../types';
import { MidiBackend, MidiInputPort } from './midi-backend';

export interface MixerInputOptions {
  /** Substring an input port name must contain */
  portMatch: string;
  pollIntervalMs: number;
  backend: MidiBackend;
  logger?: Logger;
}

export class MixerInput extends EventEmitter {
  private backend: MidiBackend;
  private portMatch: string;
  private pollIntervalMs: number;
  private log: Logger;

  private port: MidiInputPort | null = null;
  private portName: string | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private warnedUnsupported: Set<string> = new Set();
  private failedOpens: Set<string> = new Set();

  constructor(options: MixerInputOptions) {
    super();
    this.backend = options.backend;
    this.portMatch = options.portMatch;
    this.pollIntervalMs = options.pollIntervalMs;
    this.log = options.logger ?? getLogger('MixerInput');
  }

  start(): void {
    if (this.pollTimer) return;
    this.log.info(`Waiting for a MIDI input matching "${this.portMatch}"...`);
    this.poll();
    this.pollTimer = setInterval(() => this.poll(), this.pollIntervalMs);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.closePort();
  }

  isAttached(): boolean {
    return this.port !== null;
  }

  /** Label of the attached mixer, or null */
  getLabel(): string | null {
    return this.portName === null ? null : deviceLabel(this.portName);
  }

  /** One discovery pass: detect a vanished port, or look for a new one. */
  poll(): void {
    let available: string[];
    try {
      available = this.backend.listInputs();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.emit('error', new Error(`Failed to list MIDI inputs: ${err.message}`));
      return;
    }

    if (this.portName !== null) {
      if (!available.includes(this.portName)) {
        const label = deviceLabel(this.portName);
        this.closePort();
        this.emit('detached', label);
      }
      return;
    }

    const name = available.find((n) => n.includes(this.portMatch) && this.isSupported(n));
    if (name !== undefined) {
      this.openPort(name);
    }
  }

  private isSupported(portName: string): boolean {
    if (lookupProfile(portName)) return true;
    if (!this.warnedUnsupported.has(portName)) {
      this.warnedUnsupported.add(portName);
      this.log.warn(`Ignoring unsupported MIDI input: ${portName}`);
    }
    return false;
  }

  private openPort(name: string): void {
    let port: MidiInputPort;
    try {
      port = this.backend.openInput(name);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (this.failedOpens.has(name)) {
        this.log.debug(`Still cannot open MIDI input ${name}: ${err.message}`);
      } else {
        this.failedOpens.add(name);
        this.emit('error', new Error(`Failed to open MIDI input ${name}: ${err.message}`));
      }
      return;
    }
    this.failedOpens.delete(name);

    port.onControlChange((msg) => {
      this.emitEvent({ type: 'cc', controller: msg.controller, value: msg.value });
    });
    port.onNoteOn((msg) => {
      this.emitEvent({ type: 'note', note: msg.note, velocity: msg.velocity });
    });
    port.onNoteOff((msg) => {
      this.emitEvent({ type: 'noteOff', note: msg.note, velocity: msg.velocity });
    });

    this.port = port;
    this.portName = name;
    this.emit('attached', deviceLabel(name));
  }

  private emitEvent(event: MixerEvent): void {
    this.emit('event', event);
  }

  private closePort(): void {
    if (!this.port) return;
    try {
      this.port.close();
    } catch (error) {
      this.log.debug(`Closing ${this.portName} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    this.port = null;
    this.portName = null;
  }
}
