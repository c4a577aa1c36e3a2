/**
 * Command dispatch for the mdgraph CLI.
 */

import {
  parseCreateGraphOptions,
  runCreateGraph,
  printCreateGraphHelp
} from './commands/create-graph.js';
import {
  parseTraverseGraphOptions,
  runTraverseGraph,
  printTraverseGraphHelp
} from './commands/traverse-graph.js';
import {
  parseExportScriptOptions,
  runExportScript,
  printExportScriptHelp
} from './commands/export-script.js';
import type { CommandContext } from './utils/context.js';
import { UsageError, extractGlobalOptions } from './utils/options.js';
import { levelFromVerbosity } from '../src/runtime/utils/logger.js';
import { getErrorMessage } from '../src/runtime/utils/errors.js';

import { VERSION } from './version.js';

const COMMAND_ACTIONS: Record<string, string> = {
  'create-graph': 'creating graph',
  'traverse-graph': 'traversing graph',
  'export-script': 'exporting script',
};

function printRootHelp(): void {
  console.log(`mdgraph v${VERSION}

Parse Markdown files into Neo4j graphs and traverse them.

Usage:
  mdgraph create-graph --file <path> [options]   Replace the stored graph with a Markdown file
  mdgraph traverse-graph [options]               Print the stored graph as Markdown
  mdgraph export-script --file <path> [options]  Print the Cypher script for a Markdown file
  mdgraph help <command>                         Show help for a command

Global options:
  -v, --verbose    Increase log verbosity (-v info, -vv debug, -vvv trace)
  -h, --help       Show this message
  --version        Show CLI version

Environment:
  NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD, NEO4J_DATABASE (also read from .env)
`);
}

/**
 * Run the CLI against `argv` (without node and script path).
 * @returns the process exit code
 */
export async function main(argv: string[], ctx: CommandContext): Promise<number> {
  const { verbose, rest } = extractGlobalOptions(argv);
  ctx.logger.setLevel(levelFromVerbosity(verbose));

  if (rest.length === 0) {
    printRootHelp();
    return 0;
  }

  const [command, ...args] = rest;

  try {
    switch (command) {
      case '-h':
      case '--help':
        printRootHelp();
        return 0;

      case '--version':
        console.log(VERSION);
        return 0;

      case 'help':
        switch (args[0]) {
          case 'create-graph':
            printCreateGraphHelp();
            break;
          case 'traverse-graph':
            printTraverseGraphHelp();
            break;
          case 'export-script':
            printExportScriptHelp();
            break;
          default:
            printRootHelp();
        }
        return 0;

      case 'create-graph': {
        const options = parseCreateGraphOptions(args);
        if (options.help) {
          printCreateGraphHelp();
          return 0;
        }
        await runCreateGraph(options, ctx);
        return 0;
      }

      case 'traverse-graph': {
        const options = parseTraverseGraphOptions(args);
        if (options.help) {
          printTraverseGraphHelp();
          return 0;
        }
        await runTraverseGraph(options, ctx);
        return 0;
      }

      case 'export-script': {
        const options = parseExportScriptOptions(args);
        if (options.help) {
          printExportScriptHelp();
          return 0;
        }
        await runExportScript(options, ctx);
        return 0;
      }

      default:
        ctx.logger.error(`Unknown command "${command}".`);
        printRootHelp();
        return 1;
    }
  } catch (error) {
    if (error instanceof UsageError) {
      ctx.logger.error(error.message);
      return 1;
    }
    ctx.logger.error(`Error ${COMMAND_ACTIONS[command] ?? 'running command'}: ${getErrorMessage(error)}`);
    return 1;
  }
}
