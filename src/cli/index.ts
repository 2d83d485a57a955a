#!/usr/bin/env node
/**
 * @fileoverview Wayfarer CLI
 *
 * Commands:
 *   wayfarer [chat] [--async]          - Interactive travel chat (default)
 *   wayfarer search "<query>" [--top-k] - Similar and related places, no model
 *   wayfarer check [--json]            - Vector index and graph health
 *   wayfarer help [command]            - Show help
 *
 * @packageDocumentation
 */

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { loadConfig } from '../config/index.js';
import { showHelp } from './help.js';
import { chatCommand } from './commands/chat.js';
import { searchCommand } from './commands/search.js';
import { checkCommand } from './commands/check.js';
import { getErrorMessage } from '../utils/errors.js';
import { createError, formatError, getExitCode } from './errors.js';

type Command = 'chat' | 'search' | 'check' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  'chat': {
    description: 'Start the interactive travel chat',
    usage: 'wayfarer chat [--async]',
  },
  'search': {
    description: 'Show similar places and related places, without the model',
    usage: 'wayfarer search "<query>" [--top-k N]',
  },
  'check': {
    description: 'Report vector index and graph database health',
    usage: 'wayfarer check [--json]',
  },
  'help': {
    description: 'Show help information',
    usage: 'wayfarer help [command]',
  },
};

const CLI_OPTIONS = {
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
  config: { type: 'string', short: 'c' },
  async: { type: 'boolean', default: false },
  json: { type: 'boolean', default: false },
  'top-k': { type: 'string' },
  verbose: { type: 'boolean', default: false },
} satisfies ParseArgsConfig['options'];

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

function parseTopK(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw createError('INVALID_ARGUMENT', `--top-k must be a positive integer, got ${raw}`);
  }
  return value;
}

function parseCommandLine(args: string[]) {
  try {
    return parseArgs({
      args,
      options: CLI_OPTIONS,
      allowPositionals: true,
    });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseCommandLine(process.argv.slice(2));

  if (values.version) {
    const { WAYFARER_VERSION } = await import('../index.js');
    console.log(`wayfarer ${WAYFARER_VERSION.string}`);
    return;
  }

  if (values.verbose) {
    process.env.WAYFARER_LOG_LEVEL = 'debug';
  }

  const command = positionals[0] ?? 'chat';
  const commandArgs = positionals.slice(1);

  if (values.help || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : undefined);
    return;
  }

  if (!isCommand(command)) {
    throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      available: Object.keys(COMMANDS),
    });
  }

  const config = await loadConfig({ path: values.config });

  switch (command) {
    case 'chat':
      await chatCommand({ config, async: values.async });
      break;
    case 'search':
      await searchCommand({
        config,
        query: commandArgs.join(' '),
        topK: parseTopK(values['top-k']),
      });
      break;
    case 'check':
      await checkCommand({ config, json: values.json });
      break;
  }
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exitCode = getExitCode(error);
});
