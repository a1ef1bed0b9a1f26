#!/usr/bin/env node

/**
 * PCK Client CLI
 *
 * Connects to a gateway, scans for modules and prints what it found, or
 * keeps running and logs module inputs.
 */

import { PckClient } from './client.js';
import { loadConfig, validateConfig } from './config/loader.js';
import { formatAddress } from './core/address.js';
import { getLogger } from './observability/logger.js';
import { VERSION } from './index.js';

// -----------------------------------------------------------------------------
// CLI Arguments
// -----------------------------------------------------------------------------

interface CliArgs {
  configPath?: string;
  host?: string;
  port?: number;
  dump?: boolean;
  validate?: boolean;
  help?: boolean;
  version?: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-c':
      case '--config':
        result.configPath = args[++i];
        break;

      case '-H':
      case '--host':
        result.host = args[++i];
        break;

      case '-p':
      case '--port': {
        const port = Number.parseInt(args[++i] ?? '', 10);
        if (!Number.isNaN(port)) {
          result.port = port;
        }
        break;
      }

      case '--dump':
        result.dump = true;
        break;

      case '--validate':
        result.validate = true;
        break;

      case '-h':
      case '--help':
        result.help = true;
        break;

      case '-v':
      case '--version':
        result.version = true;
        break;
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Help & Version
// -----------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
PCK Gateway Client

Usage: pck-client [options]

Options:
  -c, --config <path>   Path to configuration file
  -H, --host <host>     Gateway host
  -p, --port <port>     Gateway port
  --dump                Scan for modules, print them as JSON and exit
  --validate            Validate configuration and exit
  -h, --help            Show this help message
  -v, --version         Show version number

Environment Variables:
  PCK_CONFIG_PATH       Path to configuration file
  PCK_*                 Configuration overrides, e.g. PCK_CONNECTION_HOST

Examples:
  pck-client -H 192.168.1.10               Connect and log module inputs
  pck-client -c ./pck.config.json --dump   Print discovered modules
`);
}

// -----------------------------------------------------------------------------
// Validation Mode
// -----------------------------------------------------------------------------

function runValidation(configPath?: string): void {
  try {
    const config = loadConfig({ configPath });
    const result = validateConfig(config);

    if (result.valid) {
      console.log('✓ Configuration is valid');
      console.log('\nLoaded configuration:');
      console.log(JSON.stringify({ ...config, connection: { ...config.connection, password: '***' } }, null, 2));
      process.exit(0);
    } else {
      console.error('✗ Configuration is invalid:');
      for (const error of result.errors ?? []) {
        console.error(`  - ${error}`);
      }
      process.exit(1);
    }
  } catch (error) {
    console.error('✗ Failed to load configuration:');
    console.error(`  ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

// -----------------------------------------------------------------------------
// Main
// -----------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    console.log(VERSION);
    process.exit(0);
  }

  if (args.validate) {
    runValidation(args.configPath);
    return;
  }

  const fileConfig = loadConfig({ configPath: args.configPath });
  const client = new PckClient({
    ...fileConfig,
    connection: {
      ...fileConfig.connection,
      ...(args.host !== undefined && { host: args.host }),
      ...(args.port !== undefined && { port: args.port }),
    },
    discovery: { ...fileConfig.discovery, scanOnConnect: true },
  });

  // Handle shutdown signals
  const shutdown = async (signal: string): Promise<void> => {
    getLogger().info({ signal }, 'Received shutdown signal');
    await client.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    getLogger().fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    await client.start();
  } catch (error) {
    console.error('Failed to connect:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const connection = client.getConnection();
  if (!connection) return;

  if (args.dump) {
    await client.waitForDiscovery();
    console.log(JSON.stringify(connection.dumpModules(), null, 2));
    await client.stop();
    process.exit(0);
  }

  connection.onInput((input) => {
    const source = 'source' in input ? formatAddress(input.source) : 'gateway';
    getLogger().info({ source, input }, `Input ${input.type}`);
  });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
