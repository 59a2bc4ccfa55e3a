#!/usr/bin/env node

/**
 * tool-search CLI
 *
 * Commands:
 * - search: Rank the tools of a JSON catalog against a query
 * - keywords: Show the keywords extracted from some text
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { searchCommand } from './commands/search.js';
import { keywordsCommand } from './commands/keywords.js';

const program = new Command();

function fail(error: unknown): void {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
}

program
  .name('tool-search')
  .description('Keyword search over MCP tool descriptors')
  .version('1.0.0');

/**
 * Search command - rank catalog tools against a query
 */
program
  .command('search <query...>')
  .description('Rank the tools of a catalog against a query')
  .option('-c, --catalog <path>', 'Tool catalog JSON file')
  .option('-k, --top-k <n>', 'Maximum number of results')
  .option('--json', 'Print results as JSON')
  .option('--explain', 'Show the keyword matches behind each score')
  .addHelpText('after', `
Examples:
  $ tool-search search api design -c tools.json
  $ tool-search search "run tests" -k 3 --json
  $ tool-search search perf --explain`)
  .action(async (query: string[], options: { catalog?: string; topK?: string; json?: boolean; explain?: boolean }) => {
    try {
      console.log(await searchCommand(query, options));
    } catch (error) {
      fail(error);
    }
  });

/**
 * Keywords command - show extracted keywords
 */
program
  .command('keywords <text...>')
  .description('Show the keywords extracted from text')
  .action((text: string[]) => {
    console.log(keywordsCommand(text));
  });

program.parseAsync().catch(fail);
