#!/usr/bin/env node
/**
 * lanwire - Find peers on the local network and exchange identities.
 *
 * @example
 * ```bash
 * # Discover peers for five seconds using the text encoding
 * lanwire discover --timeout 5000
 *
 * # Discover this host through its own announcements
 * lanwire discover --allow-loopback --timeout 3000 --transport byte
 *
 * # Connect a client and a server on 127.0.0.1 and exchange identities
 * lanwire loopback
 * ```
 */

import type * as net from 'node:net';
import { parseArgs } from 'node:util';

import { VERSION } from '../index.js';
import { DISCOVERY_DEFAULTS } from '../types.js';
import { configureLogger, createLogger } from '../logger.js';
import { Messenger } from '../transport/index.js';
import { BroadcastConnector, LoopbackClient, LoopbackServer } from '../discovery/index.js';
import {
  byteProtocol,
  exchangeIdentity,
  textProtocol,
  type IdentityProtocol,
} from './identity-exchange.js';

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_LOOPBACK_TIMEOUT_MS = 10000;

// =============================================================================
// CLI Argument Definition
// =============================================================================

const argsConfig = {
  options: {
    'udp-port': {
      type: 'string',
      default: String(DISCOVERY_DEFAULTS.UDP_PORT),
    },
    'tcp-port': {
      type: 'string',
      default: String(DISCOVERY_DEFAULTS.TCP_PORT),
    },
    interval: {
      type: 'string',
      default: String(DISCOVERY_DEFAULTS.BROADCAST_INTERVAL_MS),
    },
    timeout: {
      type: 'string',
    },
    'allow-loopback': {
      type: 'boolean',
      default: false,
    },
    transport: {
      type: 'string',
      short: 't',
      default: 'json',
    },
    verbose: {
      type: 'boolean',
      short: 'V',
      default: false,
    },
    help: {
      type: 'boolean',
      short: 'h',
      default: false,
    },
    version: {
      type: 'boolean',
      short: 'v',
      default: false,
    },
  },
  strict: true,
  allowPositionals: true,
} as const;

// =============================================================================
// Help & Version Output
// =============================================================================

function printHelp(): void {
  const help = `
lanwire - LAN peer discovery and message exchange

USAGE:
  lanwire discover [OPTIONS]
  lanwire loopback [OPTIONS]

COMMANDS:
  discover                Announce this host, connect to peers and exchange identities
  loopback                Connect a client and a server on 127.0.0.1 and exchange identities

OPTIONS:
      --udp-port <number> Discovery port (default: ${DISCOVERY_DEFAULTS.UDP_PORT})
      --tcp-port <number> Connection port (default: ${DISCOVERY_DEFAULTS.TCP_PORT})
      --interval <ms>     Interval between announcements (default: ${DISCOVERY_DEFAULTS.BROADCAST_INTERVAL_MS})
      --timeout <ms>      Stop after this long (discover default: run until Ctrl+C)
      --allow-loopback    Connect to this host's own announcements
  -t, --transport <name>  Message encoding: json, byte (default: json)
  -V, --verbose           Log debug output
  -h, --help              Show this help message
  -v, --version           Show version number
`.trim();

  console.log(help);
}

// =============================================================================
// Argument Validation
// =============================================================================

type Command = 'discover' | 'loopback';

interface ValidatedArgs {
  command: Command;
  udpPort: number;
  tcpPort: number;
  intervalMs: number;
  timeoutMs: number | undefined;
  allowLoopback: boolean;
  transport: 'json' | 'byte';
  verbose: boolean;
}

type ParsedValues = ReturnType<typeof parseArgs<typeof argsConfig>>['values'];

function parseInteger(name: string, text: string | undefined, min: number, errors: string[]): number {
  const value = Number(text);
  if (!Number.isInteger(value) || value < min) {
    errors.push(`Invalid ${name}: ${text}. Must be an integer of at least ${min}.`);
  }
  return value;
}

function validateArgs(values: ParsedValues, positionals: string[]): ValidatedArgs {
  const errors: string[] = [];

  const [command, ...extra] = positionals;
  if (command !== 'discover' && command !== 'loopback') {
    errors.push(command === undefined ? 'Missing command' : `Unknown command: ${command}`);
  }
  if (extra.length > 0) {
    errors.push(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const udpPort = parseInteger('UDP port', values['udp-port'], 1, errors);
  const tcpPort = parseInteger('TCP port', values['tcp-port'], 1, errors);
  if (udpPort > 65535 || tcpPort > 65535) {
    errors.push('Ports must be between 1 and 65535.');
  }
  const intervalMs = parseInteger('interval', values.interval, 1, errors);
  const timeoutMs =
    values.timeout === undefined ? undefined : parseInteger('timeout', values.timeout, 0, errors);

  const transport = values.transport ?? 'json';
  if (transport !== 'json' && transport !== 'byte') {
    errors.push(`Invalid transport: ${transport}. Must be 'json' or 'byte'.`);
  }

  if (
    errors.length > 0 ||
    (command !== 'discover' && command !== 'loopback') ||
    (transport !== 'json' && transport !== 'byte')
  ) {
    console.error('Error: Invalid arguments\n');
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    console.error('\nRun "lanwire --help" for usage information.');
    process.exit(1);
  }

  return {
    command,
    udpPort,
    tcpPort,
    intervalMs,
    timeoutMs,
    allowLoopback: values['allow-loopback'] ?? false,
    transport,
    verbose: values.verbose ?? false,
  };
}

// =============================================================================
// Commands
// =============================================================================

async function discover<M>(args: ValidatedArgs, protocol: IdentityProtocol<M>): Promise<number> {
  const exchanges: Array<Promise<void>> = [];
  const logger = createLogger('cli');

  const connector = new BroadcastConnector({
    udpPort: args.udpPort,
    tcpPort: args.tcpPort,
    broadcastIntervalMs: args.intervalMs,
    allowLoopback: args.allowLoopback,
    timeoutMs: args.timeoutMs ?? 0,
    onConnect: (socket: net.Socket, address: string) => {
      const messenger = new Messenger(socket, protocol.codec);
      exchanges.push(
        exchangeIdentity(messenger, protocol)
          .then((identity) => {
            if (identity !== null) {
              console.log(`${address}\t${identity}`);
            }
          })
          .catch((error: unknown) => {
            logger.error({ err: error, address }, 'identity exchange failed');
          }),
      );
    },
  });

  const shutdown = (): void => {
    connector.stop();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  connector.on('stopped', (reason) => {
    if (reason === 'failed') {
      console.error('Discovery stopped: a listener failed (is the port in use?)');
    }
  });

  await connector.run();
  await Promise.all(exchanges);

  const peers = connector.peers();
  console.log(`${peers.length} peer(s) found${peers.length > 0 ? `: ${peers.join(', ')}` : ''}`);
  for (const address of peers) {
    connector.getSocket(address)?.destroy();
  }

  return connector.getStopReason() === 'failed' ? 1 : 0;
}

async function loopback<M>(args: ValidatedArgs, protocol: IdentityProtocol<M>): Promise<number> {
  const timeoutMs = args.timeoutMs ?? DEFAULT_LOOPBACK_TIMEOUT_MS;
  const server = new LoopbackServer({ tcpPort: args.tcpPort, timeoutMs });
  const client = new LoopbackClient({ tcpPort: args.tcpPort, timeoutMs });

  const [serverSocket, clientSocket] = await Promise.all([server.connect(), client.connect()]);
  if (serverSocket === null || clientSocket === null) {
    serverSocket?.destroy();
    clientSocket?.destroy();
    console.error('Loopback connection failed');
    return 1;
  }

  const identities = await Promise.all([
    exchangeIdentity(new Messenger(serverSocket, protocol.codec), protocol),
    exchangeIdentity(new Messenger(clientSocket, protocol.codec), protocol),
  ]);
  serverSocket.destroy();
  clientSocket.destroy();

  if (identities.some((identity) => identity === null)) {
    console.error('Identity exchange failed');
    return 1;
  }

  console.log('OKAY');
  return 0;
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let args: ReturnType<typeof parseArgs<typeof argsConfig>>;

  try {
    args = parseArgs(argsConfig);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error('Run "lanwire --help" for usage information.');
    process.exit(1);
  }

  if (args.values.help) {
    printHelp();
    process.exit(0);
  }

  if (args.values.version) {
    console.log(`lanwire v${VERSION}`);
    process.exit(0);
  }

  const validated = validateArgs(args.values, args.positionals);
  if (validated.verbose) {
    configureLogger({ level: 'debug' });
  }

  const run: <M>(args: ValidatedArgs, protocol: IdentityProtocol<M>) => Promise<number> =
    validated.command === 'discover' ? discover : loopback;
  const exitCode =
    validated.transport === 'byte'
      ? await run(validated, byteProtocol())
      : await run(validated, textProtocol());

  process.exit(exitCode);
}

// =============================================================================
// Execute
// =============================================================================

main().catch((error: unknown) => {
  console.error('Unexpected error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
