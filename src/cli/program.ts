/**
 * Command definition for eml-extract
 */

import { Command } from 'commander';
import { runExtract } from './extract.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('eml-extract')
    .description('Extract attachments from .eml message files')
    .version('1.0.0')
    .argument('<inputs...>', 'Message files or directories containing .eml files')
    .option('-o, --output <dir>', 'Output directory (default: a folder next to the first input)')
    .option('--no-subfolder', 'Do not create a folder per message subject')
    .option('--classify', 'Group attachments into folders by file extension', false)
    .option('--no-recursive', 'Do not descend into subdirectories of input directories')
    .option('--json', 'Print one JSON object per line', false)
    .option('-q, --quiet', 'Only print errors and the summary', false)
    .option('-v, --verbose', 'Print every written file', false)
    .action((inputs: string[], options: ExtractCommandOptions) => {
      process.exitCode = runExtract(inputs, options);
    });

  return program;
}

export interface ExtractCommandOptions {
  output?: string;
  subfolder: boolean;
  classify: boolean;
  recursive: boolean;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}
