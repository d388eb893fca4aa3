import { DimensionMismatchError } from '../errors.js';
import { createRandom, gaussian, type RandomSource } from './random.js';
import type { FeatureVector } from './encoder.js';

export const DEFAULT_LEARNING_RATE = 0.15;
export const DEFAULT_INIT_STD_DEV = 0.5;

const ACTIVATION_CLAMP = 500;

export interface NetworkWeights {
  w1: number[][]; // input x hidden
  w2: number[][]; // hidden x output
  b1: number[];
  b2: number[];
}

export interface NetworkOptions {
  inputSize: number;
  hiddenSize: number;
  outputSize: number;
  learningRate?: number;
  initStdDev?: number;
  random?: RandomSource;
  weights?: NetworkWeights;
}

export interface ForwardResult {
  hidden: number[];
  output: number[];
}

export function sigmoid(x: number): number {
  const clamped = Math.max(-ACTIVATION_CLAMP, Math.min(ACTIVATION_CLAMP, x));
  return 1 / (1 + Math.exp(-clamped));
}

/**
 * Two-layer feed-forward network with sigmoid activations, trained online by
 * back-propagation. Weights are mutated in place by `trainStep`.
 */
export class Network {
  readonly inputSize: number;
  readonly hiddenSize: number;
  readonly outputSize: number;
  readonly learningRate: number;

  private w1: number[][];
  private w2: number[][];
  private b1: number[];
  private b2: number[];

  constructor(options: NetworkOptions) {
    this.inputSize = requireSize('input', options.inputSize);
    this.hiddenSize = requireSize('hidden', options.hiddenSize);
    this.outputSize = requireSize('output', options.outputSize);
    this.learningRate = options.learningRate ?? DEFAULT_LEARNING_RATE;

    if (options.weights) {
      this.checkWeights(options.weights);
      const copy = cloneWeights(options.weights);
      this.w1 = copy.w1;
      this.w2 = copy.w2;
      this.b1 = copy.b1;
      this.b2 = copy.b2;
    } else {
      const random = options.random ?? createRandom();
      const std = options.initStdDev ?? DEFAULT_INIT_STD_DEV;
      this.w1 = randomMatrix(this.inputSize, this.hiddenSize, random, std);
      this.w2 = randomMatrix(this.hiddenSize, this.outputSize, random, std);
      this.b1 = new Array<number>(this.hiddenSize).fill(0);
      this.b2 = new Array<number>(this.outputSize).fill(0);
    }
  }

  forward(input: FeatureVector): ForwardResult {
    this.checkVector('Input', input, this.inputSize);

    const hidden = new Array<number>(this.hiddenSize);
    for (let j = 0; j < this.hiddenSize; j++) {
      let sum = 0;
      for (let i = 0; i < this.inputSize; i++) {
        sum += input[i] * this.w1[i][j];
      }
      hidden[j] = sigmoid(sum + this.b1[j]);
    }

    const output = new Array<number>(this.outputSize);
    for (let k = 0; k < this.outputSize; k++) {
      let sum = 0;
      for (let j = 0; j < this.hiddenSize; j++) {
        sum += hidden[j] * this.w2[j][k];
      }
      output[k] = sigmoid(sum + this.b2[k]);
    }

    return { hidden, output };
  }

  predict(input: FeatureVector): number[] {
    return this.forward(input).output;
  }

  /**
   * One back-propagation step toward `targets`. Returns the mean squared error
   * of the forward pass taken before the update.
   */
  trainStep(input: FeatureVector, targets: number[]): number {
    const { hidden, output } = this.forward(input);
    const t = this.padTargets(targets);
    const lr = this.learningRate;

    const outErrors = output.map((o, k) => o * (1 - o) * (t[k] - o));
    const hiddenErrors = hidden.map((h, j) => {
      let sum = 0;
      for (let k = 0; k < this.outputSize; k++) {
        sum += outErrors[k] * this.w2[j][k];
      }
      return h * (1 - h) * sum;
    });

    for (let j = 0; j < this.hiddenSize; j++) {
      for (let k = 0; k < this.outputSize; k++) {
        this.w2[j][k] += lr * outErrors[k] * hidden[j];
      }
    }
    for (let i = 0; i < this.inputSize; i++) {
      for (let j = 0; j < this.hiddenSize; j++) {
        this.w1[i][j] += lr * hiddenErrors[j] * input[i];
      }
    }
    for (let k = 0; k < this.outputSize; k++) {
      this.b2[k] += lr * outErrors[k];
    }
    for (let j = 0; j < this.hiddenSize; j++) {
      this.b1[j] += lr * hiddenErrors[j];
    }

    let loss = 0;
    for (let k = 0; k < this.outputSize; k++) {
      loss += (t[k] - output[k]) ** 2;
    }
    return loss / this.outputSize;
  }

  snapshot(): NetworkWeights {
    return cloneWeights({ w1: this.w1, w2: this.w2, b1: this.b1, b2: this.b2 });
  }

  // Short targets repeat their last element; long ones are cut to the output size.
  private padTargets(targets: number[]): number[] {
    if (targets.length === 0) {
      throw new DimensionMismatchError('Target', this.outputSize, 0);
    }
    const last = targets[targets.length - 1];
    const padded = targets.slice(0, this.outputSize);
    while (padded.length < this.outputSize) {
      padded.push(last);
    }
    return padded;
  }

  private checkVector(what: string, vec: number[], expected: number): void {
    if (vec.length !== expected) {
      throw new DimensionMismatchError(what, expected, vec.length);
    }
    for (const value of vec) {
      if (!Number.isFinite(value)) {
        throw new RangeError(`${what} contains a non-finite value: ${value}`);
      }
    }
  }

  private checkWeights(weights: NetworkWeights): void {
    this.checkMatrix('W1', weights.w1, this.inputSize, this.hiddenSize);
    this.checkMatrix('W2', weights.w2, this.hiddenSize, this.outputSize);
    this.checkVector('Hidden bias', weights.b1, this.hiddenSize);
    this.checkVector('Output bias', weights.b2, this.outputSize);
  }

  private checkMatrix(what: string, matrix: number[][], rows: number, cols: number): void {
    if (matrix.length !== rows) {
      throw new DimensionMismatchError(`${what} rows`, rows, matrix.length);
    }
    for (const row of matrix) {
      this.checkVector(`${what} row`, row, cols);
    }
  }
}

function requireSize(what: string, size: number): number {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Network ${what} size must be a positive integer, got ${size}`);
  }
  return size;
}

function randomMatrix(rows: number, cols: number, random: RandomSource, std: number): number[][] {
  const matrix: number[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: number[] = [];
    for (let c = 0; c < cols; c++) {
      row.push(gaussian(random, 0, std));
    }
    matrix.push(row);
  }
  return matrix;
}

function cloneWeights(weights: NetworkWeights): NetworkWeights {
  return {
    w1: weights.w1.map((row) => [...row]),
    w2: weights.w2.map((row) => [...row]),
    b1: [...weights.b1],
    b2: [...weights.b2],
  };
}
