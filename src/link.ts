/**
 * OnAirLink
 *
 * Dispatch loop: mixer MIDI input -> session -> Pro DJ Link packets on
 * the network. Owns the session, so every event is processed to
 * completion before the next one is looked at.
 */

import { Logger } from 'pino';
import { LinkStats, createLinkStats, formatLinkStats } from './link-stats';
import { getLogger } from './logger';
import { MixerInput } from './midi/mixer-input';
import { MixerSession } from './session';
import { MixerEvent, OutboundPacket } from './types';

/** What the link needs from the network side */
export interface PacketTransmitter {
  open(): Promise<void>;
  send(data: Buffer): Promise<string>;
  close(): void;
}

export interface OnAirLinkOptions {
  input: MixerInput;
  transmitter: PacketTransmitter;
  deviceName?: string;
  logger?: Logger;
}

export class OnAirLink {
  private input: MixerInput;
  private transmitter: PacketTransmitter;
  private session: MixerSession;
  private stats: LinkStats = createLinkStats();
  private log: Logger;
  private running = false;

  private onAttached = (label: string) => this.handleAttached(label);
  private onDetached = (label: string) => this.handleDetached(label);
  private onEvent = (event: MixerEvent) => this.handleEvent(event);
  private onError = (err: Error) => this.recordError(err);

  constructor(options: OnAirLinkOptions) {
    this.input = options.input;
    this.transmitter = options.transmitter;
    this.log = options.logger ?? getLogger('Link');
    this.session = new MixerSession({ deviceName: options.deviceName, logger: options.logger });
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.transmitter.open();

    this.input.on('attached', this.onAttached);
    this.input.on('detached', this.onDetached);
    this.input.on('event', this.onEvent);
    this.input.on('error', this.onError);
    this.input.start();
    this.running = true;
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.input.stop();
    this.input.removeListener('attached', this.onAttached);
    this.input.removeListener('detached', this.onDetached);
    this.input.removeListener('event', this.onEvent);
    this.input.removeListener('error', this.onError);
    this.transmitter.close();
    this.log.info(`Stopped: ${formatLinkStats(this.stats)}`);
  }

  getSession(): MixerSession {
    return this.session;
  }

  getStats(): LinkStats {
    return { ...this.stats, packetsSent: { ...this.stats.packetsSent } };
  }

  private handleAttached(label: string): void {
    if (!this.session.attach(label)) return;
    this.stats.attached = true;
    this.stats.deviceLabel = label;
    this.stats.attachCount++;
    this.stats.lastAttachedAt = Date.now();
    this.log.info(`MIDI USB connected to: ${label}`);
  }

  private handleDetached(label: string): void {
    this.session.detach();
    this.stats.attached = false;
    this.stats.lastDetachedAt = Date.now();
    this.log.info(`MIDI USB disconnected from: ${label}`);
  }

  private handleEvent(event: MixerEvent): void {
    this.stats.eventsHandled++;
    for (const packet of this.session.handleEvent(event)) {
      this.transmit(packet);
    }
  }

  private transmit(packet: OutboundPacket): void {
    this.transmitter.send(packet.data).then(
      (address) => {
        this.stats.packetsSent[packet.kind]++;
        this.log.debug(`Sent ${packet.kind} packet to ${address}`);
      },
      (err: unknown) => {
        this.stats.sendErrors++;
        this.recordError(err instanceof Error ? err : new Error(String(err)));
      },
    );
  }

  private recordError(err: Error): void {
    this.stats.lastError = err.message;
    this.stats.lastErrorAt = Date.now();
    this.log.warn(err.message);
  }
}
