/**
 * export-script - render the Cypher script for a Markdown file
 *
 * Produces the same wipe / create statements create-graph runs, without
 * connecting to a database.
 */

import { promises as fs } from 'fs';
import { MarkdownTreeBuilder } from '../../src/ingestion/markdown-tree.js';
import { generateCypherScript } from '../../src/ingestion/cypher-script.js';
import { MdGraphError, getErrorMessage } from '../../src/runtime/utils/errors.js';
import type { CommandContext } from '../utils/context.js';
import { readMarkdownFile } from '../utils/files.js';
import { UsageError, takeValue } from '../utils/options.js';

export interface ExportScriptOptions {
  file?: string;
  output?: string;
  help?: boolean;
}

export function printExportScriptHelp(): void {
  console.log(`
Usage: mdgraph export-script --file <path> [--output <path>]

Print the Cypher script that recreates the graph of a Markdown file.

Options:
  -f, --file <path>      Markdown file to parse (required)
  -o, --output <path>    Write the script to a file instead of stdout
  -v, --verbose          Increase log verbosity (repeatable)
  -h, --help             Show this help

Examples:
  mdgraph export-script -f README.md | cypher-shell -u neo4j -p secret
  mdgraph export-script -f README.md -o graph.cypher
`);
}

export function parseExportScriptOptions(args: string[]): ExportScriptOptions {
  const options: ExportScriptOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--file':
      case '-f':
        options.file = takeValue(args, i++);
        break;
      case '--output':
      case '-o':
        options.output = takeValue(args, i++);
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown option "${arg}" for export-script`);
    }
  }

  return options;
}

export async function runExportScript(options: ExportScriptOptions, ctx: CommandContext): Promise<string> {
  if (!options.file) {
    throw new UsageError('export-script requires --file <path>');
  }

  const content = await readMarkdownFile(options.file);
  const root = new MarkdownTreeBuilder(ctx.logger).parse(content);
  const script = `${generateCypherScript(root)}\n`;

  if (options.output) {
    try {
      await fs.writeFile(options.output, script, 'utf-8');
    } catch (error) {
      throw new MdGraphError('input', `Cannot write ${options.output}: ${getErrorMessage(error)}`, { cause: error });
    }
    ctx.logger.info(`Cypher script written to ${options.output}`);
  } else {
    ctx.stdout(script);
  }

  return script;
}
