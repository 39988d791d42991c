#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { createInterface } from 'node:readline';
import { loadConfig } from '../config.js';
import { ConnectionManager } from '../connection/manager.js';
import { InjectorServer } from '../injector/server.js';
import { OfflineDecoder, decodeHexMessage } from '../offline.js';
import { ConsoleReporter, formatMessage } from './reporter.js';

dotenv.config();

async function cmdRun() {
  const config = loadConfig();
  const reporter = new ConsoleReporter(config.messageLog);

  const manager = ConnectionManager.fromConfig(config);
  const injector = new InjectorServer(manager, config.injector);
  reporter.attachManager(manager);
  reporter.attachInjector(injector);

  if (config.mode === 'proxy' && config.upstream) {
    console.log(`Proxy mode, relaying to ${config.upstream.host}:${config.upstream.port}`);
  } else {
    console.log('Standalone mode, acknowledging panel frames locally');
  }

  await manager.listen();
  const injectorAddress = await injector.listen();
  console.log(`Injector listening on ${injectorAddress.address}:${injectorAddress.port}`);

  const shutdown = async () => {
    console.log('\nShutting down...');
    await injector.close();
    await manager.close();
    process.exit(0);
  };
  process.on('SIGINT', () => {
    shutdown().catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
  });
}

function printDecoded(hex: string, decoder?: OfflineDecoder) {
  const messages = decoder ? decoder.decode(hex) : decodeHexMessage(hex);
  if (messages.length === 0) {
    console.log(
      decoder && decoder.pending > 0
        ? `(page buffered, ${decoder.pending} response(s) waiting for more pages)`
        : '(nothing decoded)',
    );
    return;
  }
  for (const message of messages) {
    console.log(formatMessage(message));
    console.log(JSON.stringify(message.kind === 'b0' ? message.decoded : message.hex, null, 2));
  }
}

async function cmdDecode(hex: string[]) {
  if (hex.length > 0) {
    printDecoded(hex.join(' '));
    return;
  }

  const decoder = new OfflineDecoder();
  console.log('Paste a frame as hex, ending in 43 (checksum optional). "reset" clears paging, "quit" exits.');
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt('decode> ');
  rl.prompt();

  rl.on('line', (line) => {
    const input = line.trim();
    if (!input) { rl.prompt(); return; }
    if (input === 'quit' || input === 'exit') {
      rl.close();
      return;
    }
    if (input === 'reset') {
      decoder.reset();
      rl.prompt();
      return;
    }
    try {
      printDecoded(input, decoder);
    } catch (e) {
      console.log(`Error: ${e instanceof Error ? e.message : String(e)}`);
    }
    rl.prompt();
  });

  await new Promise<void>((resolve) => rl.once('close', resolve));
}

// Main
const [, , cmd, ...args] = process.argv;

switch (cmd) {
  case 'run':
    cmdRun().catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    });
    break;
  case 'decode':
    cmdDecode(args).catch(console.error);
    break;
  default:
    console.log('Usage:');
    console.log('  powerlink-tap run            Relay (PLINK_PROXY_MODE=true) or act as the server');
    console.log('  powerlink-tap decode [hex]   Decode one frame, or prompt for frames');
    console.log('');
    console.log('Settings are read from PLINK_* environment variables or .env:');
    console.log('  PLINK_PROXY_MODE, PLINK_LISTEN_HOST, PLINK_LISTEN_PORT,');
    console.log('  PLINK_UPSTREAM_HOST, PLINK_UPSTREAM_PORT, PLINK_INJECTOR_HOST,');
    console.log('  PLINK_INJECTOR_PORT, PLINK_MESSAGE_LOG (summary|verbose), PLINK_WATCHDOG_SECONDS');
}
