/**
 * create-graph - parse a Markdown file and replace the stored graph with it
 *
 * Usage:
 *   mdgraph create-graph --file README.md
 *   mdgraph create-graph -f notes.md --uri bolt://db:7687 --password secret
 */

import { MarkdownTreeBuilder } from '../../src/ingestion/markdown-tree.js';
import { GraphWriter, type WriteStats } from '../../src/ingestion/graph-writer.js';
import type { CommandContext } from '../utils/context.js';
import { withClient } from '../utils/context.js';
import { readMarkdownFile } from '../utils/files.js';
import {
  CONNECTION_HELP,
  UsageError,
  parseConnectionFlag,
  resolveConnection,
  takeValue,
  type ConnectionOptions,
} from '../utils/options.js';

export interface CreateGraphOptions extends ConnectionOptions {
  file?: string;
  help?: boolean;
}

export function printCreateGraphHelp(): void {
  console.log(`
Usage: mdgraph create-graph --file <path> [options]

Parse a Markdown file and replace the graph stored in Neo4j with it.

Options:
  -f, --file <path>      Markdown file to parse (required)
${CONNECTION_HELP}
  -v, --verbose          Increase log verbosity (repeatable)
  -h, --help             Show this help

Examples:
  mdgraph create-graph --file README.md
  mdgraph -vv create-graph -f docs/guide.md --uri bolt://localhost:7687
`);
}

export function parseCreateGraphOptions(args: string[]): CreateGraphOptions {
  const options: CreateGraphOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (parseConnectionFlag(args, i, options)) {
      i++;
      continue;
    }
    switch (arg) {
      case '--file':
      case '-f':
        options.file = takeValue(args, i++);
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown option "${arg}" for create-graph`);
    }
  }

  return options;
}

export async function runCreateGraph(options: CreateGraphOptions, ctx: CommandContext): Promise<WriteStats> {
  if (!options.file) {
    throw new UsageError('create-graph requires --file <path>');
  }

  const config = await resolveConnection(options, ctx);
  const content = await readMarkdownFile(options.file);
  const root = new MarkdownTreeBuilder(ctx.logger).parse(content);

  return withClient(ctx, config, client => new GraphWriter(client, ctx.logger).writeTree(root));
}
