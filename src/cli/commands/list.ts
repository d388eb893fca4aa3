import { Argument, Command } from '@commander-js/extra-typings';
import { CATEGORIES, categoryLabel } from '../../memory/types.js';
import { openClassifier, reportFailure } from '../session.js';
import { printCategory } from '../ui.js';

export const listCommand = new Command('list')
  .description('List remembered items (all categories by default)')
  .addArgument(new Argument('[category]', 'Only this category').choices(CATEGORIES))
  .action((category) => {
    try {
      const classifier = openClassifier();
      const categories = category ? [category] : CATEGORIES;

      for (const c of categories) {
        printCategory(c, categoryLabel(c), classifier.list(c));
      }
      console.log();
    } catch (err) {
      reportFailure(err);
    }
  });
