/**
 * traverse-graph - render the stored graph back into Markdown on stdout
 */

import { Neo4jGraphStore } from '../../src/runtime/graph/neo4j-graph-store.js';
import { GraphTraversal } from '../../src/runtime/traversal/graph-traversal.js';
import type { CommandContext } from '../utils/context.js';
import { withClient } from '../utils/context.js';
import {
  CONNECTION_HELP,
  UsageError,
  parseConnectionFlag,
  resolveConnection,
  type ConnectionOptions,
} from '../utils/options.js';

export interface TraverseGraphOptions extends ConnectionOptions {
  help?: boolean;
}

export function printTraverseGraphHelp(): void {
  console.log(`
Usage: mdgraph traverse-graph [options]

Read the graph stored in Neo4j and print it as Markdown.

Options:
${CONNECTION_HELP}
  -v, --verbose          Increase log verbosity (repeatable)
  -h, --help             Show this help

Examples:
  mdgraph traverse-graph > roundtrip.md
  mdgraph traverse-graph --uri bolt://db:7687 --database docs
`);
}

export function parseTraverseGraphOptions(args: string[]): TraverseGraphOptions {
  const options: TraverseGraphOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (parseConnectionFlag(args, i, options)) {
      i++;
      continue;
    }
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown option "${arg}" for traverse-graph`);
    }
  }

  return options;
}

export async function runTraverseGraph(options: TraverseGraphOptions, ctx: CommandContext): Promise<string> {
  const config = await resolveConnection(options, ctx);

  const markdown = await withClient(ctx, config, client =>
    new GraphTraversal(new Neo4jGraphStore(client), ctx.logger).traverseToMarkdown()
  );

  ctx.stdout(markdown);
  return markdown;
}
