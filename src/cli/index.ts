import { Command } from '@commander-js/extra-typings';
import { initCommand } from './commands/init.js';
import { scoreCommand } from './commands/score.js';
import { labelCommand } from './commands/label.js';
import { addCommand } from './commands/add.js';
import { decideCommand } from './commands/decide.js';
import { askCommand } from './commands/ask.js';
import { listCommand } from './commands/list.js';
import { forgetCommand } from './commands/forget.js';
import { configCommand } from './commands/config.js';
import { chatCommand } from './commands/chat.js';
import { serveCommand } from './commands/serve.js';
import { categoryOption } from './session.js';

export const program = new Command()
  .name('banline')
  .description('Banline - trainable kid-friendly content filter')
  .version('0.1.0');

// Initialize a new project
program
  .command('init')
  .description('Initialize Banline in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(initCommand);

// Interactive labelling loop
program
  .command('chat')
  .description('Start the interactive labelling loop')
  .addOption(categoryOption())
  .action(chatCommand);

// MCP server for LLM clients
program
  .command('serve')
  .description('Run the Banline MCP server over stdio')
  .action(serveCommand);

// Scoring and labelling
program.addCommand(scoreCommand);
program.addCommand(labelCommand);
program.addCommand(addCommand);
program.addCommand(decideCommand);

// Memory
program.addCommand(askCommand);
program.addCommand(listCommand);
program.addCommand(forgetCommand);

// Configuration management
program.addCommand(configCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});
