import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { buildConfig } from '../config';
import { applyCliOptions, parseArgs } from '../index';

const argv = (...args: string[]) => ['node', 'onair-link', ...args];

describe('parseArgs', () => {
  it('should return no options for a bare invocation', () => {
    assert.deepEqual(parseArgs(argv()), {});
  });

  it('should parse short and long flags', () => {
    assert.deepEqual(parseArgs(argv('-c', 'booth.yml', '-l', '-i', 'en0')), {
      configPath: 'booth.yml',
      localBroadcast: true,
      interfaceName: 'en0',
    });
    assert.deepEqual(parseArgs(argv('--list-models')), { listModels: true });
    assert.deepEqual(parseArgs(argv('--help')), { help: true });
  });

  it('should let debug win over verbose in either order', () => {
    assert.equal(parseArgs(argv('-v')).logLevel, 'info');
    assert.equal(parseArgs(argv('-v', '-d')).logLevel, 'debug');
    assert.equal(parseArgs(argv('-d', '-v')).logLevel, 'debug');
  });

  it('should reject a flag missing its value', () => {
    assert.throws(() => parseArgs(argv('-c')), { message: '-c requires a file path' });
    assert.throws(() => parseArgs(argv('--interface')), { message: '--interface requires an interface name' });
  });

  it('should reject unknown flags', () => {
    assert.throws(() => parseArgs(argv('--bogus')), { message: 'Unknown option: --bogus' });
  });
});

describe('applyCliOptions', () => {
  it('should leave the config alone without overrides', () => {
    const config = buildConfig({});
    assert.deepEqual(applyCliOptions(config, {}), config);
  });

  it('should override interface, broadcast mode and log level', () => {
    const config = buildConfig({ network: { port: 50002 } });
    const result = applyCliOptions(config, { interfaceName: 'en0', localBroadcast: true, logLevel: 'debug' });
    assert.deepEqual(result.network, { interface: 'en0', port: 50002, localBroadcast: true });
    assert.equal(result.logging.level, 'debug');
    assert.equal(result.deviceName, 'On Air Link');
  });
});
