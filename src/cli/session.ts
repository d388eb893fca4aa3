/**
 * Opens the classifier for the project in the working directory.
 */

import { Option } from '@commander-js/extra-typings';
import { findProjectRoot, getMemoryPath, initProject, loadConfig, toClassifierSettings } from '../config/index.js';
import { Classifier } from '../classifier/classifier.js';
import { loadTrainingGrounds } from '../classifier/training-grounds.js';
import { CATEGORIES, DEFAULT_CATEGORY } from '../memory/types.js';
import { success, info, error } from './ui.js';

export const categoryOption = () =>
  new Option('-c, --category <category>', 'Content category')
    .choices(CATEGORIES)
    .default(DEFAULT_CATEGORY);

/**
 * Auto-initialize Banline if not already initialized
 */
function ensureInitialized(): string {
  const root = findProjectRoot();
  if (root) {
    return root;
  }

  const cwd = process.cwd();
  console.log(info('Banline not initialized. Auto-initializing...'));

  try {
    initProject(cwd);
    console.log(success('Initialized Banline'));
    return cwd;
  } catch (err) {
    throw new Error(`Failed to auto-initialize: ${err instanceof Error ? err.message : 'Unknown error'}`);
  }
}

/**
 * Build the classifier: pre-train on the training grounds, then restore the
 * remembered items.
 */
export function openClassifier(projectRoot?: string): Classifier {
  const root = projectRoot ?? ensureInitialized();
  const config = loadConfig(root);

  const classifier = new Classifier({
    settings: toClassifierSettings(config),
    memoryFile: getMemoryPath(root),
  });

  if (config.training.seedOnStart) {
    classifier.seed(loadTrainingGrounds(config.training.groundsFile));
  }

  classifier.load();
  return classifier;
}

export function reportFailure(err: unknown): never {
  console.log(error(err instanceof Error ? err.message : 'Unknown error'));
  process.exit(1);
}
