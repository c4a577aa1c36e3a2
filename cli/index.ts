#!/usr/bin/env node
/**
 * mdgraph CLI entry point.
 *
 * Parse Markdown files into Neo4j graphs and traverse them back into
 * Markdown.
 */

import process from 'process';
import dotenv from 'dotenv';
import { main } from './main.js';
import { createNeo4jClient, type CommandContext } from './utils/context.js';
import { Logger } from '../src/runtime/utils/logger.js';

dotenv.config();

const ctx: CommandContext = {
  logger: new Logger(),
  env: process.env,
  stdout: text => process.stdout.write(text),
  createClient: createNeo4jClient,
};

main(process.argv.slice(2), ctx)
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Unexpected error:', error instanceof Error ? error.stack || error.message : error);
    process.exitCode = 1;
  });
