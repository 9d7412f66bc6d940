#!/usr/bin/env node
import { Command } from 'commander';
import { recommendCommand } from './commands/recommend.js';

const program = new Command();

program
  .name('trackboard')
  .description('Interactive "next song" recommendations from a seed track')
  .version('0.1.0');

program.addCommand(recommendCommand, { isDefault: true });

await program.parseAsync();
