#!/usr/bin/env node
import { program } from 'commander';
import { registerInitCommand } from './cli/init-command';
import { registerResolveCommand } from './cli/resolve-command';
import { registerValidateCommand } from './cli/validate-command';

// Set up Commander program
program
  .name('sectionconf')
  .description('Resolve sectioned INI configuration into validated settings')
  .version('1.0.0');

// Register commands
registerResolveCommand(program);
registerValidateCommand(program);
registerInitCommand(program);

// Parse command line arguments
program.parse();
