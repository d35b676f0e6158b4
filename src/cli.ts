#!/usr/bin/env node
import { program } from 'commander';
import { buildCommand } from './commands/build.js';
import { checkCommand } from './commands/check.js';

const DESCRIPTION = `Build a static blog from Markdown posts with front-matter`;

program
  .name('postpress')
  .description(DESCRIPTION)
  .version('0.1.0');

program
  .command('build')
  .description('Render every post and the index into the output directory')
  .option('-c, --config <file>', 'Config file (default: postpress.config.json if present)')
  .option('--content <dir>', 'Directory holding the Markdown posts')
  .option('-o, --out <dir>', 'Output directory')
  .option('--public <dir>', 'Static assets copied into the output')
  .option('--drafts', 'Include posts marked draft: true')
  .option('--clean', 'Empty the output directory before writing')
  .option('--sanitize', 'Parse and sanitize raw HTML in posts')
  .action(buildCommand);

program
  .command('check')
  .description('Load and render every post without writing output')
  .option('-c, --config <file>', 'Config file (default: postpress.config.json if present)')
  .option('--content <dir>', 'Directory holding the Markdown posts')
  .option('--public <dir>', 'Static assets used for image measurement')
  .option('--drafts', 'Include posts marked draft: true')
  .option('--sanitize', 'Parse and sanitize raw HTML in posts')
  .action(checkCommand);

await program.parseAsync();
