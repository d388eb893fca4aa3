import { encode, euclideanDistance, type FeatureVector } from '../engine/encoder.js';
import {
  Network,
  DEFAULT_INIT_STD_DEV,
  DEFAULT_LEARNING_RATE,
  type NetworkWeights,
} from '../engine/network.js';
import { createRandom, type RandomSource } from '../engine/random.js';
import { ContentMemory, DEFAULT_BAN_THRESHOLD } from '../memory/store.js';
import { readSnapshot, writeSnapshot, type SnapshotLoadResult } from '../memory/snapshot.js';
import { parseCategory, type Category } from '../memory/types.js';
import type { LabelledExample } from './training-grounds.js';

// Fixed score used by addItem to mark an item unsafe regardless of the network.
export const UNSAFE_OVERRIDE_SCORE = 0.9;

export interface ClassifierSettings {
  inputSize: number;
  hiddenSize: number;
  outputSize: number;
  learningRate: number;
  banThreshold: number;
  initStdDev: number;
  seed?: number;
  epochs: number;
  reinforceEpochs: number;
  minSimilarity: number;
}

export const DEFAULT_CLASSIFIER_SETTINGS: ClassifierSettings = {
  inputSize: 64,
  hiddenSize: 32,
  outputSize: 8,
  learningRate: DEFAULT_LEARNING_RATE,
  banThreshold: DEFAULT_BAN_THRESHOLD,
  initStdDev: DEFAULT_INIT_STD_DEV,
  epochs: 5,
  reinforceEpochs: 2,
  minSimilarity: 0.3,
};

export interface ClassifierOptions {
  settings?: Partial<ClassifierSettings>;
  memoryFile?: string;
  // Overrides `settings.seed`
  random?: RandomSource;
  weights?: NetworkWeights;
}

export interface Decision {
  safe: boolean;
  score: number;
}

export interface LabelOutcome {
  safe: boolean;
  stored: boolean;
  score: number;
  message: string;
}

export interface Match {
  text: string;
  similarity: number;
}

/**
 * Binds the encoder, network and content memory into the labelling
 * workflows. One owner per instance: training mutates the network in place.
 */
export class Classifier {
  readonly settings: ClassifierSettings;
  readonly network: Network;
  readonly memory: ContentMemory;
  readonly memoryFile?: string;

  constructor(options: ClassifierOptions = {}) {
    this.settings = { ...DEFAULT_CLASSIFIER_SETTINGS, ...options.settings };
    this.memoryFile = options.memoryFile;

    this.network = new Network({
      inputSize: this.settings.inputSize,
      hiddenSize: this.settings.hiddenSize,
      outputSize: this.settings.outputSize,
      learningRate: this.settings.learningRate,
      initStdDev: this.settings.initStdDev,
      random: options.random ?? createRandom(this.settings.seed),
      weights: options.weights,
    });
    this.memory = new ContentMemory(this.settings.banThreshold);
  }

  isBanned(score: number): boolean {
    return this.memory.isBanned(score);
  }

  score(text: string): number {
    return this.network.predict(this.toInput(text))[0];
  }

  /**
   * Train toward safe (all zeros) or unsafe (all ones). A safe item whose new
   * score is below the ban line is remembered. Returns the last step's loss.
   */
  train(
    text: string,
    safe: boolean,
    category: Category | string,
    epochs: number = this.settings.epochs
  ): number {
    const target = parseCategory(category);
    const input = this.toInput(text);
    const targets = this.toTargets(safe);

    let loss = 1.0;
    for (let epoch = 0; epoch < epochs; epoch++) {
      loss = this.network.trainStep(input, targets);
    }

    const prediction = this.network.predict(input)[0];
    if (safe && !this.memory.isBanned(prediction)) {
      this.memory.add(target, text, prediction);
    }
    return loss;
  }

  /**
   * Train, then store the item: safe items with their new score, unsafe ones
   * with the fixed override score (which the ban line will refuse).
   */
  addItem(text: string, safe: boolean, category: Category | string): boolean {
    const target = parseCategory(category);
    this.train(text, safe, target);
    const prediction = this.score(text);
    return this.memory.add(target, text, safe ? prediction : UNSAFE_OVERRIDE_SCORE);
  }

  // Self-supervised: only the safe direction is reinforced.
  aiDecide(text: string, category: Category | string): Decision {
    const target = parseCategory(category);
    const score = this.score(text);
    const safe = !this.memory.isBanned(score);

    if (safe) {
      this.memory.add(target, text, score);
      this.train(text, true, target, this.settings.reinforceEpochs);
    }

    return { safe, score };
  }

  /**
   * Manual label or override. Any previous entry is removed first; an unsafe
   * label leaves the item out of memory.
   */
  setLabel(text: string, safe: boolean, category: Category | string): LabelOutcome {
    const target = parseCategory(category);
    this.memory.remove(target, text);

    if (!safe) {
      this.train(text, false, target);
      return {
        safe: false,
        stored: false,
        score: this.score(text),
        message: 'Marked BAD and removed.',
      };
    }

    this.train(text, true, target);
    const score = this.score(text);
    const stored = !this.memory.isBanned(score) && this.memory.add(target, text, score);

    return {
      safe: true,
      stored,
      score,
      message: stored ? 'Marked SAFE and added.' : 'Marked SAFE, but still above the ban line.',
    };
  }

  respond(prompt: string, category: Category | string): string | null {
    return this.findMatch(prompt, category)?.text ?? null;
  }

  /**
   * Closest allowed item by `1 - euclidean distance` of encodings, among items
   * the network still scores below the ban line. Earlier entries win ties.
   */
  findMatch(prompt: string, category: Category | string): Match | null {
    const allowed = this.memory.getAllowed(parseCategory(category));
    if (allowed.size === 0) {
      return null;
    }

    const input = this.toInput(prompt);
    let best: Match | null = null;

    for (const text of allowed.keys()) {
      const similarity = 1 - euclideanDistance(input, this.toInput(text));
      if ((best === null || similarity > best.similarity) && !this.memory.isBanned(this.score(text))) {
        best = { text, similarity };
      }
    }

    return best !== null && best.similarity > this.settings.minSimilarity ? best : null;
  }

  list(category: Category | string): string[] {
    return Array.from(this.memory.getAllowed(parseCategory(category)).keys());
  }

  forget(text: string, category: Category | string): boolean {
    return this.memory.remove(parseCategory(category), text);
  }

  // Replays labelled examples in order; later labels override earlier ones.
  seed(examples: readonly LabelledExample[]): number {
    for (const example of examples) {
      this.setLabel(example.text, example.safe, example.category);
    }
    return examples.length;
  }

  load(filePath: string | undefined = this.memoryFile): SnapshotLoadResult {
    const result = readSnapshot(this.requireFile(filePath));

    switch (result.status) {
      case 'loaded':
        this.memory.restore(result.snapshot);
        break;
      case 'corrupt':
        console.warn(
          `Ignoring unreadable memory file ${result.path}: ${result.reason} (keeping current memory)`
        );
        break;
      case 'missing':
        break;
    }

    return result;
  }

  save(filePath: string | undefined = this.memoryFile): void {
    writeSnapshot(this.requireFile(filePath), this.memory.snapshot());
  }

  private toInput(text: string): FeatureVector {
    return encode(text, this.network.inputSize);
  }

  private toTargets(safe: boolean): number[] {
    return new Array<number>(this.network.outputSize).fill(safe ? 0.0 : 1.0);
  }

  private requireFile(filePath: string | undefined): string {
    if (!filePath) {
      throw new Error('No memory file configured for this classifier');
    }
    return filePath;
  }
}
