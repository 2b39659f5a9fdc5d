import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import {
  PROLINK_HEADER,
  encodeDeviceName,
  encodeFaderStartPacket,
  encodeOnAirPacket,
} from '../prolink/packet-codec';

const NAME = 'On Air Link';

function nameField(name: string): Buffer {
  const field = Buffer.alloc(20, 0);
  Buffer.from(name, 'utf-8').copy(field);
  return field;
}

describe('encodeDeviceName', () => {
  it('should null-pad a short name to 20 bytes', () => {
    const { field, truncated } = encodeDeviceName(NAME);
    assert.equal(truncated, false);
    assert.equal(field.length, 20);
    assert.deepEqual(field, nameField(NAME));
  });

  it('should keep a name of exactly 20 bytes as is', () => {
    const { field, truncated } = encodeDeviceName('ABCDEFGHIJKLMNOPQRST');
    assert.equal(truncated, false);
    assert.equal(field.toString('utf-8'), 'ABCDEFGHIJKLMNOPQRST');
  });

  it('should truncate a long name to 20 bytes and report it', () => {
    const { field, truncated } = encodeDeviceName('ABCDEFGHIJKLMNOPQRSTUVWXYZ');
    assert.equal(truncated, true);
    assert.equal(field.toString('utf-8'), 'ABCDEFGHIJKLMNOPQRST');
  });

  it('should not split a multi-byte character when truncating', () => {
    // 'a' + ten 2-byte characters = 21 bytes; the tenth would straddle the cut
    const { field, truncated } = encodeDeviceName('a' + 'é'.repeat(10));
    assert.equal(truncated, true);
    assert.equal(field.length, 20);
    assert.deepEqual(field, nameField('a' + 'é'.repeat(9)));
    assert.equal(field[19], 0);
  });
});

describe('encodeOnAirPacket', () => {
  it('should lay out header, type, name, tag, channels and trailer', () => {
    const pkt = encodeOnAirPacket(NAME, [true, false, true, false]);

    assert.equal(pkt.length, 45);
    assert.deepEqual(pkt.subarray(0, 10), PROLINK_HEADER);
    assert.equal(pkt[10], 0x03);
    assert.deepEqual(pkt.subarray(11, 31), nameField(NAME));
    assert.deepEqual([...pkt.subarray(31, 36)], [0x01, 0x00, 0x00, 0x00, 0x09]);
    assert.deepEqual([...pkt.subarray(36, 40)], [1, 0, 1, 0]);
    assert.deepEqual([...pkt.subarray(40)], [0, 0, 0, 0, 0]);
  });

  it('should size the channel region by channel count', () => {
    const pkt = encodeOnAirPacket(NAME, [false, true]);
    assert.equal(pkt.length, 43);
    assert.deepEqual([...pkt.subarray(36, 38)], [0, 1]);
  });

  it('should start with the Pro DJ Link magic "Qspt1WmJOL"', () => {
    const pkt = encodeOnAirPacket(NAME, [false, false]);
    assert.equal(pkt.subarray(0, 10).toString('ascii'), 'Qspt1WmJOL');
  });

  it('should not change length for an over-long device name', () => {
    const pkt = encodeOnAirPacket('A very long device name indeed', [true, true, true, true]);
    assert.equal(pkt.length, 45);
    assert.equal(pkt.subarray(11, 31).toString('utf-8'), 'A very long device n');
  });
});

describe('encodeFaderStartPacket', () => {
  it('should lay out header, type, name, tag and four channel states', () => {
    const pkt = encodeFaderStartPacket(NAME, 2, true);

    assert.equal(pkt.length, 40);
    assert.deepEqual(pkt.subarray(0, 10), PROLINK_HEADER);
    assert.equal(pkt[10], 0x02);
    assert.deepEqual(pkt.subarray(11, 31), nameField(NAME));
    assert.deepEqual([...pkt.subarray(31, 36)], [0x01, 0x00, 0x00, 0x00, 0x04]);
    assert.deepEqual([...pkt.subarray(36)], [2, 2, 1, 2]);
  });

  it('should encode play as 0', () => {
    const pkt = encodeFaderStartPacket(NAME, 0, false);
    assert.deepEqual([...pkt.subarray(36)], [0, 2, 2, 2]);
  });

  it('should always carry four states, whatever the channel', () => {
    for (let ch = 0; ch < 4; ch++) {
      const states = [...encodeFaderStartPacket(NAME, ch, true).subarray(36)];
      assert.equal(states.length, 4);
      states.forEach((s, i) => assert.equal(s, i === ch ? 1 : 2));
    }
  });

  it('should leave every channel unchanged for a channel outside 0-3', () => {
    const pkt = encodeFaderStartPacket(NAME, 7, true);
    assert.deepEqual([...pkt.subarray(36)], [2, 2, 2, 2]);
  });
});
