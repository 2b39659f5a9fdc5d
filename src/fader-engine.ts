/**
 * Fader State Engine
 *
 * Turns the mixer's raw control stream (0-127 values on fixed control
 * addresses) into per-channel on-air decisions and fader-start
 * transitions, and encodes them as Pro DJ Link packets.
 *
 * A channel is on air when its fader is above the threshold AND the
 * cross-fader does not cut it. Both comparisons carry a one-step
 * hysteresis that depends on the direction of motion, so a control
 * resting on a boundary does not chatter.
 *
 * Packets are only returned when their bytes differ from the last ones
 * produced for the same kind.
 */

import { Logger } from 'pino';
import { getLogger } from './logger';
import { encodeDeviceName, encodeFaderStartPacket, encodeOnAirPacket } from './prolink/packet-codec';
import { ControlChangeEvent, MixerEvent, MixerProfile, NoteEvent, OutboundPacket } from './types';

export const DEFAULT_DEVICE_NAME = 'On Air Link';

/** Default fader threshold, also the cross-fader edge margin */
export const FADER_THRESHOLD = 1;

/** Threshold when the channel fader curve is set to its low slope */
export const LOW_SLOPE_FADER_THRESHOLD = 2;

const MIDI_MAX = 127;
const MIDI_CENTER = 64;

export type CrossFaderRegion = 'left' | 'right' | 'middle';

export interface FaderEngineOptions {
  /** Name carried in every packet, at most 20 UTF-8 bytes */
  deviceName?: string;
  logger?: Logger;
}

export interface EngineState {
  channelFaderLevel: number[];
  channelOnAir: boolean[];
  crossFaderValue: number;
  crossFaderRegion: CrossFaderRegion;
  crossFaderAssign: number[];
  faderThreshold: number;
  lastOnAirPacket: Buffer | null;
  lastFaderStartPacket: Buffer | null;
  previousEvent: MixerEvent | null;
}

export function createEngineState(channelCount: number): EngineState {
  return {
    channelFaderLevel: new Array<number>(channelCount).fill(0),
    channelOnAir: new Array<boolean>(channelCount).fill(false),
    crossFaderValue: MIDI_CENTER,
    crossFaderRegion: 'middle',
    crossFaderAssign: new Array<number>(channelCount).fill(MIDI_CENTER),
    faderThreshold: FADER_THRESHOLD,
    lastOnAirPacket: null,
    lastFaderStartPacket: null,
    previousEvent: null,
  };
}

/** Offset of `addr` within [base, base + count), or -1 */
function offsetIn(addr: number, base: number, count: number): number {
  return addr >= base && addr < base + count ? addr - base : -1;
}

export class FaderEngine {
  readonly profile: MixerProfile;
  readonly deviceName: string;

  private state: EngineState;
  private log: Logger;

  constructor(profile: MixerProfile, options: FaderEngineOptions = {}) {
    this.profile = profile;
    this.deviceName = options.deviceName ?? DEFAULT_DEVICE_NAME;
    this.log = options.logger ?? getLogger('FaderEngine');
    this.state = createEngineState(profile.channelCount);

    const name = encodeDeviceName(this.deviceName);
    if (name.truncated) {
      this.log.warn(
        `Device name "${this.deviceName}" truncated to "${name.field.toString('utf-8').replace(/\0+$/, '')}"`,
      );
    }
  }

  /** Read-only copy of the current state */
  getState(): Readonly<EngineState> {
    const s = this.state;
    return {
      ...s,
      channelFaderLevel: [...s.channelFaderLevel],
      channelOnAir: [...s.channelOnAir],
      crossFaderAssign: [...s.crossFaderAssign],
    };
  }

  /**
   * Feed one mixer event. Returns the packets to transmit: none, one, or
   * a fader-start packet followed by an on-air packet.
   */
  handleEvent(event: MixerEvent): OutboundPacket[] {
    const out: OutboundPacket[] = [];

    let recognized: boolean;
    switch (event.type) {
      case 'cc':
        recognized = this.handleControlChange(event);
        break;
      case 'note':
        recognized = this.handleNote(event, out);
        break;
      default:
        recognized = false;
    }

    if (recognized) {
      const onAir = this.computeOnAir();
      const pkt = encodeOnAirPacket(this.deviceName, onAir);
      if (!this.state.lastOnAirPacket || !pkt.equals(this.state.lastOnAirPacket)) {
        this.log.debug({ onAir }, 'On air channels changed');
        out.push({ kind: 'onAir', data: pkt });
      }
      this.state.lastOnAirPacket = pkt;
    }

    this.state.previousEvent = event;
    return out;
  }

  /** Final on-air vector: fader gate AND cross-fader gate */
  computeOnAir(): boolean[] {
    const { channelOnAir, crossFaderAssign, crossFaderRegion } = this.state;
    return channelOnAir.map((on, i) => {
      const assign = crossFaderAssign[i];
      switch (crossFaderRegion) {
        case 'left': return on && assign <= MIDI_CENTER;
        case 'right': return on && assign >= MIDI_CENTER;
        default: return on;
      }
    });
  }

  private handleControlChange(event: ControlChangeEvent): boolean {
    const p = this.profile;
    const { controller, value } = event;

    if (controller === p.crossFaderAddr) {
      this.setCrossFader(value);
      return true;
    }

    const fader = offsetIn(controller, p.channelFaderBaseAddr, p.channelCount);
    if (fader >= 0) {
      const directionDown = value < this.state.channelFaderLevel[fader];
      this.state.channelFaderLevel[fader] = value;
      this.updateChannelOnAir(directionDown, this.state.faderThreshold, [fader]);
      return true;
    }

    const assign = offsetIn(controller, p.crossFaderAssignBaseAddr, p.channelCount);
    if (assign >= 0) {
      if (p.channelCount === 2) {
        this.state.crossFaderAssign[0] = value;
        this.state.crossFaderAssign[1] = MIDI_MAX - value;
      } else {
        this.state.crossFaderAssign[assign] = value;
      }
      return true;
    }

    if (p.channelFaderSlopeAddr !== undefined && controller === p.channelFaderSlopeAddr) {
      const threshold = value >= MIDI_CENTER ? FADER_THRESHOLD : LOW_SLOPE_FADER_THRESHOLD;
      if (threshold !== this.state.faderThreshold) {
        const all = this.state.channelFaderLevel.map((_, i) => i);
        this.updateChannelOnAir(threshold > this.state.faderThreshold, threshold, all);
        this.log.debug(`Fader threshold ${this.state.faderThreshold} -> ${threshold}`);
      }
      this.state.faderThreshold = threshold;
      return true;
    }

    return false;
  }

  private handleNote(event: NoteEvent, out: OutboundPacket[]): boolean {
    const base = this.profile.faderStartNoteBase;
    if (base === undefined) return false;

    const channel = offsetIn(event.note, base, this.profile.channelCount);
    if (channel < 0) return false;

    const stopped = event.velocity === 0;
    const pkt = encodeFaderStartPacket(this.deviceName, channel, stopped);
    if (!this.state.lastFaderStartPacket || !pkt.equals(this.state.lastFaderStartPacket)) {
      this.log.debug(`Fader start CH${channel + 1}: ${stopped ? 'STOP' : 'PLAY'}`);
      out.push({ kind: 'faderStart', data: pkt });
    }
    this.state.lastFaderStartPacket = pkt;

    // The mixer sends a cross-fader or channel fader message right before
    // the button note when the start is triggered by moving that control.
    const prev = this.state.previousEvent;
    if (prev?.type === 'cc') {
      const p = this.profile;
      if (prev.controller === p.crossFaderAddr) {
        this.state.crossFaderAssign[channel] = prev.value >= MIDI_CENTER ? 0 : MIDI_MAX;
      } else if (offsetIn(prev.controller, p.channelFaderBaseAddr, p.channelCount) >= 0) {
        this.state.crossFaderAssign[channel] = MIDI_CENTER;
      }
    }

    return true;
  }

  /**
   * Cross-fader edges use a margin of FADER_THRESHOLD, one step tighter
   * when moving toward the edge.
   */
  private setCrossFader(value: number): void {
    const prev = this.state.crossFaderValue;
    let region: CrossFaderRegion;
    if (value <= FADER_THRESHOLD - (value > prev ? 1 : 0)) {
      region = 'left';
    } else if (value >= MIDI_MAX - (FADER_THRESHOLD - (value < prev ? 1 : 0))) {
      region = 'right';
    } else {
      region = 'middle';
    }
    this.state.crossFaderRegion = region;
    this.state.crossFaderValue = value;
  }

  private updateChannelOnAir(directionDown: boolean, threshold: number, channels: number[]): void {
    const bias = directionDown ? 1 : 0;
    for (const i of channels) {
      this.state.channelOnAir[i] = this.state.channelFaderLevel[i] >= threshold + bias;
    }
  }
}
