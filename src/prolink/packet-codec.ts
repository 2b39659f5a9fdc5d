/**
 * Pro DJ Link packet encoder
 *
 * Builds the two mixer status packets lighting and display gear listen
 * for on UDP port 50001:
 *
 *   On-air:       header | 0x03 | name[20] | 01 00 00 00 09 | ch[N] | 00 x5
 *   Fader start:  header | 0x02 | name[20] | 01 00 00 00 04 | ch[4]
 *
 * On-air channel bytes are 1 (on air) or 0. Fader-start bytes are
 * 0 (play), 1 (stop) or 2 (leave unchanged).
 */

/** Every Pro DJ Link packet starts with these ten bytes ("Qspt1WmJOL") */
export const PROLINK_HEADER = Buffer.from([0x51, 0x73, 0x70, 0x74, 0x31, 0x57, 0x6d, 0x4a, 0x4f, 0x4c]);

export const PROLINK_PORT = 50001;

export const DEVICE_NAME_LENGTH = 20;

export const FADER_START_CHANNELS = 4;

export enum PacketType {
  FADER_START = 0x02,
  ON_AIR = 0x03,
}

export enum FaderStartState {
  PLAY = 0,
  STOP = 1,
  UNCHANGED = 2,
}

const ON_AIR_TAG = Buffer.from([0x01, 0x00, 0x00, 0x00, 0x09]);
const FADER_START_TAG = Buffer.from([0x01, 0x00, 0x00, 0x00, 0x04]);
const ON_AIR_TRAILER = Buffer.alloc(5, 0);

export interface EncodedDeviceName {
  field: Buffer;
  truncated: boolean;
}

/**
 * Encode a device name into its fixed 20-byte field: UTF-8, cut on a
 * character boundary, null-padded on the right.
 */
export function encodeDeviceName(name: string): EncodedDeviceName {
  const raw = Buffer.from(name, 'utf-8');
  const field = Buffer.alloc(DEVICE_NAME_LENGTH, 0);

  if (raw.length <= DEVICE_NAME_LENGTH) {
    raw.copy(field);
    return { field, truncated: false };
  }

  // Back up over UTF-8 continuation bytes (10xxxxxx) so a character is never split
  let end = DEVICE_NAME_LENGTH;
  while (end > 0 && (raw[end] & 0xc0) === 0x80) {
    end--;
  }
  raw.copy(field, 0, 0, end);
  return { field, truncated: true };
}

function packetPrefix(type: PacketType, name: string): Buffer {
  return Buffer.concat([PROLINK_HEADER, Buffer.from([type]), encodeDeviceName(name).field]);
}

/**
 * Encode the mixer on-air packet, one status byte per channel.
 */
export function encodeOnAirPacket(name: string, onAir: readonly boolean[]): Buffer {
  const channels = Buffer.from(onAir.map((on) => (on ? 1 : 0)));
  return Buffer.concat([packetPrefix(PacketType.ON_AIR, name), ON_AIR_TAG, channels, ON_AIR_TRAILER]);
}

/**
 * Encode a fader-start packet for one channel. The other channels are
 * always sent as "unchanged".
 */
export function encodeFaderStartPacket(name: string, channel: number, stopped: boolean): Buffer {
  const states = Buffer.alloc(FADER_START_CHANNELS, FaderStartState.UNCHANGED);
  if (Number.isInteger(channel) && channel >= 0 && channel < FADER_START_CHANNELS) {
    states[channel] = stopped ? FaderStartState.STOP : FaderStartState.PLAY;
  }
  return Buffer.concat([packetPrefix(PacketType.FADER_START, name), FADER_START_TAG, states]);
}
