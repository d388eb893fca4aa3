import { openClassifier, reportFailure } from '../session.js';
import { Repl } from '../repl.js';
import { DEFAULT_CATEGORY, type Category } from '../../memory/types.js';

interface ChatOptions {
  category?: Category;
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  try {
    const classifier = openClassifier();
    const repl = new Repl(classifier, { category: options.category ?? DEFAULT_CATEGORY });
    await repl.start();
  } catch (err) {
    reportFailure(err);
  }
}
