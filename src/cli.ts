#!/usr/bin/env node

/**
 * WebSocket to MQTT Bridge CLI
 *
 * Command-line interface for running the bridge.
 */

import { WsMqttBridge } from './bridge.js';
import { loadConfig } from './config/loader.js';
import { getLogger } from './observability/logger.js';

const VERSION = '0.1.0';

// -----------------------------------------------------------------------------
// CLI Arguments
// -----------------------------------------------------------------------------

interface CliArgs {
  configPath?: string;
  validate?: boolean;
  help?: boolean;
  version?: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '-c':
      case '--config':
        result.configPath = args[++i];
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
WebSocket to MQTT Bridge

Usage: ws-mqtt-bridge [options]

Options:
  -c, --config <path>   Path to configuration file
  --validate            Validate configuration and exit
  -h, --help            Show this help message
  -v, --version         Show version number

Environment Variables:
  BRIDGE_CONFIG_PATH    Path to configuration file
  BRIDGE_*              Configuration overrides, e.g. BRIDGE_MQTT_HOST
  LOG_LEVEL             Default log level

Examples:
  ws-mqtt-bridge                          Start with default config search
  ws-mqtt-bridge -c /data/options.json    Start with add-on options
  ws-mqtt-bridge --validate               Validate config and exit
`);
}

// -----------------------------------------------------------------------------
// Validation Mode
// -----------------------------------------------------------------------------

function runValidation(configPath?: string): void {
  try {
    const config = loadConfig({ configPath });
    console.log('✓ Configuration is valid');
    console.log('\nLoaded configuration:');
    console.log(JSON.stringify(config, null, 2));
    process.exit(0);
  } catch (error) {
    console.error('✗ Failed to load configuration:');
    console.error(`  ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

function createBridge(configPath?: string): WsMqttBridge {
  try {
    return new WsMqttBridge(loadConfig({ configPath }));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
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

  const bridge = createBridge(args.configPath);

  const shutdown = async (signal: string): Promise<void> => {
    getLogger().info({ signal }, 'Received shutdown signal');
    try {
      await bridge.stop();
      process.exit(0);
    } catch (error) {
      getLogger().error({ err: error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    getLogger().fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    getLogger().fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    await bridge.start();
  } catch (error) {
    console.error('Failed to start bridge:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
