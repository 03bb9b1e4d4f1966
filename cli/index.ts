#!/usr/bin/env tsx
/**
 * URL Phishing Detector CLI
 *
 * Offline tooling around the classifier: feature extraction, model
 * conversion and inspection, local prediction and API smoke tests.
 */

import pkg from '../package.json';

type CommandModule = { default: (args: string[], command: string) => Promise<void> };

interface CommandConfig {
  description: string;
  usage: string;
  load: () => Promise<CommandModule>;
}

const COMMANDS: Record<string, CommandConfig> = {
  // Feature commands
  'features:extract': {
    description: 'Print the lexical features of one or more URLs',
    usage: 'features:extract <url...> [--json]',
    load: () => import('./commands/features/extract')
  },
  'features:export': {
    description: 'Build a training feature matrix from a labeled URL CSV',
    usage: 'features:export [--input <path>] [--output <path>] [--url-column <name>] [--label-column <name>] [--limit <n>]',
    load: () => import('./commands/features/export')
  },

  // Model commands
  'model:inspect': {
    description: 'Show metadata, tree statistics and feature usage of a model',
    usage: 'model:inspect [--model <path>] [--json]',
    load: () => import('./commands/model/inspect')
  },
  'model:convert': {
    description: 'Convert a LightGBM model.txt into compact JSON',
    usage: 'model:convert [--input <path>] [--output <path>] [--version <v>]',
    load: () => import('./commands/model/convert')
  },
  'predict': {
    description: 'Classify URLs locally without starting the server',
    usage: 'predict <url...> [--model <path>] [--threshold <n>] [--verbose]',
    load: () => import('./commands/predict/predict')
  },

  // Testing commands
  'test:api': {
    description: 'Smoke-test a running API',
    usage: 'test:api [<url...>] [--url <base>]',
    load: () => import('./commands/test/api')
  }
};

function showHelp() {
  console.log(`
╔════════════════════════════════════════════════════════╗
║              🔐 URL Phishing Detector CLI              ║
╚════════════════════════════════════════════════════════╝

Usage: npm run cli -- <command> [options]

🧬 FEATURE COMMANDS
  features:extract <url...>  Print lexical features
  features:export            Build a training feature matrix

🌲 MODEL COMMANDS
  model:inspect              Show model metadata and feature usage
  model:convert              Convert LightGBM text to compact JSON
  predict <url...>           Classify URLs with a local model

🧪 TESTING COMMANDS
  test:api                   Smoke-test a running API

OPTIONS
  --help, -h                 Show this help message
  --version, -v              Show version

EXAMPLES
  npm run cli -- features:extract "http://192.168.1.1/login"
  npm run cli -- model:convert --input model.txt --output model.json
  npm run cli -- predict "https://www.google.com" --model model.txt
  npm run cli -- test:api --url http://localhost:5000

For detailed command help: npm run cli -- <command> --help
`);
}

function showVersion() {
  console.log(`URL Phishing Detector CLI v${pkg.version}`);
}

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    showVersion();
    return;
  }

  const command = args[0];
  const commandConfig = COMMANDS[command];

  if (!commandConfig) {
    console.error(`❌ Unknown command: ${command}\n`);
    console.error('Run "npm run cli -- --help" to see available commands');
    process.exit(1);
  }

  try {
    const commandModule = await commandConfig.load();
    await commandModule.default(args.slice(1), command);
  } catch (error) {
    console.error(`❌ Error executing command "${command}":`, error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
