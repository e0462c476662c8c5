#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for bookbinder.
 */

// Must load first: sets the logger's environment
import { config } from './config/index.js';

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { combineCommand, type CombineOptions } from './commands/combine.js';
import { chaptersCommand } from './commands/chapters.js';
import { rechapterCommand, type RechapterOptions } from './commands/rechapter.js';
import { splitCommand, type SplitOptions } from './commands/split.js';
import { collectTag, parseInteger } from './lib/options.js';

const program = new Command();

program
  .name('bookbinder')
  .description('Combine audiobook parts into one chaptered .m4b')
  .version('1.0.0');

// ============================================
// COMBINE / CLEAN (default action)
// ============================================

program
  .option('--combine', 'Combine the parts into a single .m4b file')
  .option('--clean', 'Delete the part files (after combining, or when the .m4b already exists)')
  .option('--dry-run', 'Show what would happen without writing or deleting anything')
  .option('--vbr', 'Use VBR encoding')
  .option('--quality <0-5>', 'VBR quality level (0=best, 5=worst)', parseInteger)
  .option('--bitrate <value>', 'CBR bitrate (e.g. 64k, 96k)')
  .option('--sample-rate <hz>', 'Output sample rate in Hz (e.g. 22050, 44100)', parseInteger)
  .addOption(
    new Option(
      '--chapter-threshold <n>',
      `Part count from which chapters are named "Chapter" instead of "Part" (default: ${config.chapterThreshold})`
    ).argParser(parseInteger)
  )
  .option('--chapter-titles-file <path>', 'File with one chapter title per line')
  .option('-d, --dir <path>', 'Directory holding the part files (default: current directory)')
  .option('-o, --output <path>', 'Output file (default: "<Book Name>.m4b" beside the parts)')
  .option('-t, --tag <key=value>', 'Set a metadata tag on the output (repeatable)', collectTag)
  .action(async (options: CombineOptions) => {
    await combineCommand(options, config);
  });

// ============================================
// CHAPTER COMMANDS
// ============================================

program
  .command('chapters <file>')
  .description('Show the chapter structure of an audiobook')
  .action(async (file: string) => {
    await chaptersCommand(file, config);
  });

program
  .command('rechapter')
  .description('Replace the chapters of an audiobook from a "Title HH:MM:SS.ss" list')
  .requiredOption('-i, --input <file>', 'Input audiobook')
  .requiredOption('-c, --chapters <file>', 'Chapter list file')
  .requiredOption('-o, --output <file>', 'Output audiobook')
  .action(async (options: RechapterOptions) => {
    await rechapterCommand(options, config);
  });

program
  .command('split')
  .description('Write each chapter of an audiobook as "<title> (<n>).m4b"')
  .requiredOption('-i, --input <file>', 'Input audiobook')
  .requiredOption('-o, --output <dir>', 'Output directory')
  .action(async (options: SplitOptions) => {
    await splitCommand(options, config);
  });

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('bookbinder --help'), 'for available commands');
  }
  process.exit(1);
});

await program.parseAsync();
