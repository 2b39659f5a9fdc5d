#!/usr/bin/env node

/**
 * On Air Link
 *
 * Watches a Pioneer DJM mixer over USB MIDI and broadcasts its channel
 * on-air and fader-start state as Pro DJ Link packets, so lighting and
 * display gear can follow which deck is live.
 *
 * Usage:
 *   onair-link                         # Use config.yml in current directory
 *   onair-link --config ./my.yml       # Use a specific config file
 *   onair-link -v | -d                 # Info / debug logging
 *   onair-link -l                      # Subnet broadcast instead of 255.255.255.255
 *   onair-link --list-models           # Print supported mixers and exit
 */

import { LinkConfig, loadConfig } from './config';
import { flushLogger, initLogger } from './logger';
import { OnAirLink } from './link';
import { createEasymidiBackend } from './midi/midi-backend';
import { MixerInput } from './midi/mixer-input';
import { listProfiles } from './mixer-profiles';
import { PacketSender } from './network/packet-sender';

export interface CliOptions {
  configPath?: string;
  logLevel?: 'info' | 'debug';
  localBroadcast?: boolean;
  interfaceName?: string;
  listModels?: boolean;
  help?: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        options.configPath = argv[++i];
        if (!options.configPath) throw new Error(`${arg} requires a file path`);
        break;
      case '--verbose':
      case '-v':
        if (options.logLevel !== 'debug') options.logLevel = 'info';
        break;
      case '--debug':
      case '-d':
        options.logLevel = 'debug';
        break;
      case '--no-global-broadcast':
      case '-l':
        options.localBroadcast = true;
        break;
      case '--interface':
      case '-i':
        options.interfaceName = argv[++i];
        if (!options.interfaceName) throw new Error(`${arg} requires an interface name`);
        break;
      case '--list-models':
        options.listModels = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/** Apply CLI overrides on top of the file config */
export function applyCliOptions(config: LinkConfig, options: CliOptions): LinkConfig {
  return {
    ...config,
    network: {
      ...config.network,
      interface: options.interfaceName ?? config.network.interface,
      localBroadcast: options.localBroadcast ?? config.network.localBroadcast,
    },
    logging: {
      ...config.logging,
      level: options.logLevel ?? config.logging.level,
    },
  };
}

function printHelp(): void {
  console.log('');
  console.log('  On Air Link');
  console.log('  DJM mixer on-air status to Pro DJ Link');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>          Path to config YAML file');
  console.log('    --verbose, -v                Print INFO messages');
  console.log('    --debug, -d                  Print DEBUG messages');
  console.log('    --no-global-broadcast, -l    Use the local subnet broadcast address instead of');
  console.log('                                 255.255.255.255 (always on with a link-local IP)');
  console.log('    --interface, -i <name>       Network interface (default eth0)');
  console.log('    --list-models                Print supported mixers and exit');
  console.log('    --help, -h                   Show this help');
  console.log('');
}

function printModels(): void {
  for (const p of listProfiles()) {
    const features = [
      `${p.channelCount}ch`,
      p.channelFaderSlopeAddr !== undefined ? 'fader curve' : null,
      p.faderStartNoteBase !== undefined ? 'fader start' : null,
    ].filter((f): f is string => f !== null);
    console.log(`  ${p.model.padEnd(12)} ${features.join(', ')}`);
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  let config: LinkConfig;
  try {
    options = parseArgs(process.argv);
    if (options.help) {
      printHelp();
      return;
    }
    if (options.listModels) {
      printModels();
      return;
    }
    config = applyCliOptions(loadConfig(options.configPath), options);
  } catch (error) {
    console.error(`[Error] ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const log = initLogger({ level: config.logging.level, pretty: config.logging.pretty }).child({ module: 'Main' });
  log.debug('Program start');

  const link = new OnAirLink({
    input: new MixerInput({
      backend: await createEasymidiBackend(),
      portMatch: config.midi.portMatch,
      pollIntervalMs: config.midi.pollIntervalMs,
    }),
    transmitter: new PacketSender({
      interfaceName: config.network.interface,
      localBroadcast: config.network.localBroadcast,
      port: config.network.port,
    }),
    deviceName: config.deviceName,
  });

  const shutdown = () => {
    link.stop();
    flushLogger().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`[Error] Log flush failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(0);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await link.start();
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`[Fatal] ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
