#!/usr/bin/env node

/**
 * sqltrail CLI
 */

import { Command } from 'commander';
import { findCommand } from './commands/find.js';
import { lastCommand } from './commands/last.js';
import { idsCommand } from './commands/ids.js';
import { groupsCommand } from './commands/groups.js';
import { watchCommand } from './commands/watch.js';
import { serveCommand } from './commands/serve.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('sqltrail')
  .description('sqltrail - recover executed SQL and its parameters from application logs')
  .version('1.0.0');

// Register commands
program.addCommand(initCommand);
program.addCommand(findCommand);
program.addCommand(lastCommand);
program.addCommand(idsCommand);
program.addCommand(groupsCommand);
program.addCommand(watchCommand);
program.addCommand(serveCommand);

program.parse(process.argv);
