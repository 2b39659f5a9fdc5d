/**
 * UDP packet sender
 *
 * One broadcast-enabled UDP socket for the lifetime of the link. The
 * destination is resolved again for each packet, since the interface
 * may fall back to (or recover from) a link-local address at any time.
 */

import * as dgram from 'dgram';
import { PROLINK_PORT } from '../prolink/packet-codec';
import { resolveInterfaceDestination } from './broadcast';

export interface PacketSenderOptions {
  interfaceName: string;
  localBroadcast: boolean;
  port?: number;
  /** Overrides interface-based destination lookup */
  resolveAddress?: () => string;
}

export class PacketSender {
  private socket: dgram.Socket | null = null;
  private readonly port: number;
  private readonly resolveAddress: () => string;

  constructor(options: PacketSenderOptions) {
    this.port = options.port ?? PROLINK_PORT;
    this.resolveAddress = options.resolveAddress
      ?? (() => resolveInterfaceDestination(options.interfaceName, options.localBroadcast));
  }

  /** Bind the socket and enable broadcast */
  open(): Promise<void> {
    if (this.socket) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');
      const onError = (err: Error) => {
        socket.close();
        reject(err);
      };
      socket.once('error', onError);
      socket.bind(0, () => {
        socket.removeListener('error', onError);
        socket.setBroadcast(true);
        this.socket = socket;
        resolve();
      });
    });
  }

  isOpen(): boolean {
    return this.socket !== null;
  }

  /**
   * Send one packet. Rejects if the socket is closed, no destination can
   * be resolved, or the send fails.
   */
  send(data: Buffer): Promise<string> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error('Packet sender is not open'));
    }

    let address: string;
    try {
      address = this.resolveAddress();
    } catch (error) {
      return Promise.reject(error);
    }

    return new Promise((resolve, reject) => {
      socket.send(data, 0, data.length, this.port, address, (err) => {
        if (err) reject(err);
        else resolve(address);
      });
    });
  }

  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
  }
}
