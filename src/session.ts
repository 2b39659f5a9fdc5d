/**
 * Mixer Session
 *
 * Owns the single FaderEngine across USB hot-plug. Reconnecting the same
 * mixer keeps every fader position it had; connecting a different one
 * starts from a clean engine so stale positions never leak across
 * devices.
 *
 *   searching --attach--> attached --detach--> detached --attach--> attached
 *
 * Emits:
 *   'stateChange' (state: SessionState, label: string | null)
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { FaderEngine, FaderEngineOptions } from './fader-engine';
import { getLogger } from './logger';
import { lookupProfile } from './mixer-profiles';
import { MixerEvent, OutboundPacket } from './types';

export type SessionState = 'searching' | 'attached' | 'detached';

export interface MixerSessionOptions {
  deviceName?: string;
  logger?: Logger;
}

export class MixerSession extends EventEmitter {
  private state: SessionState = 'searching';
  private label: string | null = null;
  private engine: FaderEngine | null = null;
  private engineOptions: FaderEngineOptions;
  private log: Logger;

  constructor(options: MixerSessionOptions = {}) {
    super();
    this.log = options.logger ?? getLogger('Session');
    this.engineOptions = { deviceName: options.deviceName, logger: options.logger };
  }

  getState(): SessionState {
    return this.state;
  }

  getLabel(): string | null {
    return this.label;
  }

  getEngine(): FaderEngine | null {
    return this.engine;
  }

  /**
   * Attach a device by its label. Returns false, leaving the session
   * untouched, if the label names no supported mixer.
   */
  attach(label: string): boolean {
    const profile = lookupProfile(label);
    if (!profile) {
      this.log.warn(`Unsupported mixer: ${label}`);
      return false;
    }

    if (!this.engine || label !== this.label) {
      if (this.engine) {
        this.log.info(`Mixer changed from ${this.label} to ${label}, resetting state`);
      }
      this.engine = new FaderEngine(profile, this.engineOptions);
    }

    this.label = label;
    this.setState('attached');
    return true;
  }

  /** Transport lost. Engine state is kept for a reattach. */
  detach(): void {
    if (this.state !== 'attached') return;
    this.setState('detached');
  }

  /** Feed one event. Nothing comes out unless a mixer is attached. */
  handleEvent(event: MixerEvent): OutboundPacket[] {
    if (this.state !== 'attached' || !this.engine) return [];
    return this.engine.handleEvent(event);
  }

  private setState(state: SessionState): void {
    if (state === this.state) return;
    this.state = state;
    this.emit('stateChange', state, this.label);
  }
}
