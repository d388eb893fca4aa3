import chalk from 'chalk';
import { initProject, BANLINE_DIR, CONFIG_FILE } from '../../config/index.js';
import { success, error, keyValue } from '../ui.js';

interface InitOptions {
  force?: boolean;
}

export function initCommand(options: InitOptions): void {
  try {
    initProject(process.cwd(), options.force ?? false);
  } catch (err) {
    if (err instanceof Error) {
      console.log(error(err.message));
    }
    process.exit(1);
  }

  console.log();
  console.log(success(chalk.bold('Banline initialized!')));
  console.log();
  console.log(`   ${keyValue('Config', `${BANLINE_DIR}/${CONFIG_FILE}`)}`);
  console.log();
  console.log(chalk.gray('   Try: banline score "good game everyone"'));
  console.log(chalk.gray('   Scores change between runs unless the weights are seeded:'));
  console.log(chalk.gray('   banline config set classifier.seed 42'));
  console.log();
}
