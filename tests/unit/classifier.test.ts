import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { Classifier, UNSAFE_OVERRIDE_SCORE, type ClassifierOptions } from '../../src/classifier/classifier.js';
import type { NetworkWeights } from '../../src/engine/network.js';
import { UnknownCategoryError } from '../../src/errors.js';

// Constant randomness gives every weight the same value, so results are stable.
function quietClassifier(options: ClassifierOptions = {}): Classifier {
  return new Classifier({ random: () => 0.5, ...options });
}

// Every output saturates near 1: everything scores as banned.
function alarmedWeights(): NetworkWeights {
  return {
    w1: Array.from({ length: 64 }, () => new Array<number>(32).fill(0)),
    w2: Array.from({ length: 32 }, () => new Array<number>(8).fill(2)),
    b1: new Array<number>(32).fill(0),
    b2: new Array<number>(8).fill(0),
  };
}

function tmpDir(): string {
  const dir = path.join(os.tmpdir(), `banline-classifier-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

describe('Classifier', () => {
  let classifier: Classifier;

  beforeEach(() => {
    classifier = quietClassifier();
  });

  describe('score', () => {
    it('returns output unit 0 of the network', () => {
      const input = Array.from({ length: 64 }, () => 0);
      input[63] = 0.3; // encode('a', 64)
      expect(classifier.score('a')).toBe(classifier.network.predict(input)[0]);
    });

    it('lies strictly between 0 and 1', () => {
      for (const text of ['', 'hello', 'see you at recess']) {
        const score = classifier.score(text);
        expect(score).toBeGreaterThan(0);
        expect(score).toBeLessThan(1);
      }
    });

    it('scores everything as banned with saturated weights', () => {
      const alarmed = new Classifier({ weights: alarmedWeights() });
      expect(alarmed.isBanned(alarmed.score('hello'))).toBe(true);
    });
  });

  describe('train', () => {
    it('remembers a safe item that scores below the line', () => {
      classifier.train('rainbow', true, 'words');
      expect(classifier.memory.get('words', 'rainbow')).toBe(classifier.score('rainbow'));
    });

    it('never remembers an unsafe item', () => {
      classifier.train('go away loser', false, 'phrases');
      expect(classifier.memory.has('phrases', 'go away loser')).toBe(false);
    });

    it('moves the score toward the label', () => {
      const before = classifier.score('shut up idiot');
      classifier.train('shut up idiot', false, 'phrases');
      expect(classifier.score('shut up idiot')).toBeGreaterThan(before);
    });

    it('returns 1.0 when no epochs run', () => {
      const before = classifier.network.snapshot();
      expect(classifier.train('hello', true, 'words', 0)).toBe(1.0);
      expect(classifier.network.snapshot()).toEqual(before);
    });

    it('rejects unknown categories before training', () => {
      const before = classifier.network.snapshot();
      expect(() => classifier.train('hello', true, 'jokes')).toThrow(UnknownCategoryError);
      expect(classifier.network.snapshot()).toEqual(before);
    });
  });

  describe('addItem', () => {
    it('stores a safe item with its retrained score', () => {
      expect(classifier.addItem('rainbow', true, 'words')).toBe(true);
      expect(classifier.memory.get('words', 'rainbow')).toBe(classifier.score('rainbow'));
    });

    it('refuses the fixed unsafe score at the ban line', () => {
      expect(UNSAFE_OVERRIDE_SCORE).toBe(0.9);
      expect(classifier.addItem('badword', false, 'words')).toBe(false);
      expect(classifier.memory.has('words', 'badword')).toBe(false);
    });

    it('leaves an earlier safe entry in place when marked unsafe', () => {
      classifier.addItem('crazy', true, 'words');
      classifier.addItem('crazy', false, 'words');
      expect(classifier.memory.has('words', 'crazy')).toBe(true);
    });
  });

  describe('aiDecide', () => {
    it('accepts, stores and reinforces a low-scoring item', () => {
      const before = classifier.score('good game');
      const decision = classifier.aiDecide('good game', 'phrases');

      expect(decision).toEqual({ safe: true, score: before });
      const after = classifier.score('good game');
      expect(after).toBeLessThan(before);
      expect(classifier.memory.get('phrases', 'good game')).toBe(after);
    });

    it('takes no action on a banned item', () => {
      const alarmed = new Classifier({ weights: alarmedWeights() });
      const weights = alarmed.network.snapshot();

      const decision = alarmed.aiDecide('hello', 'phrases');

      expect(decision.safe).toBe(false);
      expect(decision.score).toBeGreaterThanOrEqual(0.7);
      expect(alarmed.memory.size()).toBe(0);
      expect(alarmed.network.snapshot()).toEqual(weights);
    });
  });

  describe('setLabel', () => {
    it('stores a phrase labelled safe', () => {
      const outcome = classifier.setLabel('eat your veggies', true, 'phrases');

      expect(outcome.safe).toBe(true);
      expect(outcome.stored).toBe(true);
      expect(outcome.message).toBe('Marked SAFE and added.');
      expect(outcome.score).toBeLessThan(0.7);
      expect(classifier.memory.get('phrases', 'eat your veggies')).toBe(outcome.score);
      expect(classifier.memory.getAllowed('phrases').has('eat your veggies')).toBe(true);
    });

    it('leaves a phrase labelled bad out of memory', () => {
      const outcome = classifier.setLabel('kill yourself', false, 'phrases');

      expect(outcome.safe).toBe(false);
      expect(outcome.stored).toBe(false);
      expect(outcome.message).toBe('Marked BAD and removed.');
      expect(classifier.memory.has('phrases', 'kill yourself')).toBe(false);
    });

    it('undoes an earlier safe decision', () => {
      classifier.aiDecide('prank call strangers', 'game_ideas');
      expect(classifier.memory.has('game_ideas', 'prank call strangers')).toBe(true);

      classifier.setLabel('prank call strangers', false, 'game_ideas');
      expect(classifier.memory.has('game_ideas', 'prank call strangers')).toBe(false);
    });

    it('does not store a safe label the network still bans', () => {
      const alarmed = new Classifier({ weights: alarmedWeights() });
      const outcome = alarmed.setLabel('hello', true, 'words');

      expect(outcome.stored).toBe(false);
      expect(outcome.message).toBe('Marked SAFE, but still above the ban line.');
      expect(alarmed.memory.has('words', 'hello')).toBe(false);
    });

    it('only touches the named category', () => {
      classifier.setLabel('tag', true, 'game_ideas');
      classifier.setLabel('tag', false, 'words');
      expect(classifier.memory.has('game_ideas', 'tag')).toBe(true);
    });
  });

  describe('respond', () => {
    it('returns null for an empty category', () => {
      expect(classifier.respond('playing minecraft', 'phrases')).toBeNull();
    });

    it('finds a near-duplicate', () => {
      classifier.setLabel('playing Minecraft', true, 'phrases');

      // Encodings differ in two slots by 0.3 each: 1 - sqrt(0.18)
      const match = classifier.findMatch('playing minecraft', 'phrases');
      expect(match?.text).toBe('playing Minecraft');
      expect(match?.similarity).toBeCloseTo(1 - Math.sqrt(0.18), 10);
      expect(classifier.respond('playing minecraft', 'phrases')).toBe('playing Minecraft');
    });

    it('returns null when nothing is close enough', () => {
      classifier.setLabel('playing Minecraft', true, 'phrases');
      expect(classifier.respond('zzzzzzzzzzzzzzzzzzzz qqqqqqq', 'phrases')).toBeNull();
    });

    it('prefers the first inserted item on a tie', () => {
      // '!' and 'a' encode identically
      classifier.memory.add('words', '!', 0.1);
      classifier.memory.add('words', 'a', 0.1);
      expect(classifier.respond('a', 'words')).toBe('!');
    });

    it('skips items the network now scores as banned', () => {
      const alarmed = new Classifier({ weights: alarmedWeights() });
      alarmed.memory.add('phrases', 'good game', 0.1);
      expect(alarmed.respond('good game', 'phrases')).toBeNull();
    });

    it('honours the configured minimum similarity', () => {
      const picky = quietClassifier({ settings: { minSimilarity: 0.9 } });
      picky.setLabel('playing Minecraft', true, 'phrases');
      expect(picky.respond('playing minecraft', 'phrases')).toBeNull();
      expect(picky.respond('playing Minecraft', 'phrases')).toBe('playing Minecraft');
    });
  });

  describe('list / forget', () => {
    it('lists allowed texts in insertion order', () => {
      classifier.memory.add('words', 'hello', 0.1);
      classifier.memory.add('words', 'friend', 0.2);
      expect(classifier.list('words')).toEqual(['hello', 'friend']);
      expect(classifier.list('phrases')).toEqual([]);
    });

    it('forgets an item', () => {
      classifier.memory.add('words', 'hello', 0.1);
      expect(classifier.forget('hello', 'words')).toBe(true);
      expect(classifier.forget('hello', 'words')).toBe(false);
    });

    it('rejects unknown categories', () => {
      expect(() => classifier.list('jokes')).toThrow(UnknownCategoryError);
      expect(() => classifier.respond('hi', 'jokes')).toThrow(UnknownCategoryError);
      expect(() => classifier.setLabel('hi', true, 'jokes')).toThrow(UnknownCategoryError);
    });
  });

  describe('seed', () => {
    it('replays labels in order so later labels win', () => {
      expect(
        classifier.seed([
          { text: 'crazy', safe: false, category: 'words' },
          { text: 'crazy', safe: true, category: 'words' },
        ])
      ).toBe(2);
      expect(classifier.memory.has('words', 'crazy')).toBe(true);

      classifier.seed([
        { text: 'crazy', safe: true, category: 'words' },
        { text: 'crazy', safe: false, category: 'words' },
      ]);
      expect(classifier.memory.has('words', 'crazy')).toBe(false);
    });
  });

  describe('configuration', () => {
    it('uses the default topology', () => {
      expect(classifier.network.inputSize).toBe(64);
      expect(classifier.network.hiddenSize).toBe(32);
      expect(classifier.network.outputSize).toBe(8);
      expect(classifier.network.learningRate).toBe(0.15);
      expect(classifier.settings.banThreshold).toBe(0.7);
    });

    it('keeps independently configured instances apart', () => {
      const strict = quietClassifier({ settings: { banThreshold: 0.5 } });
      const lenient = quietClassifier({ settings: { banThreshold: 0.9 } });
      expect(strict.isBanned(0.6)).toBe(true);
      expect(lenient.isBanned(0.6)).toBe(false);
    });

    it('is reproducible from a seed', () => {
      const a = new Classifier({ settings: { seed: 11 } });
      const b = new Classifier({ settings: { seed: 11 } });
      expect(a.score('hello')).toBe(b.score('hello'));
    });
  });

  describe('save / load', () => {
    let dir: string;

    beforeEach(() => { dir = tmpDir(); });
    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it('round-trips memory through a fresh instance', () => {
      const file = path.join(dir, 'memory.json');
      const first = quietClassifier({ memoryFile: file });
      first.setLabel('eat your veggies', true, 'phrases');
      first.setLabel('rainbow', true, 'words');
      first.setLabel('treasure hunt with riddles', true, 'game_ideas');
      first.save();

      const second = new Classifier({ memoryFile: file });
      expect(second.load().status).toBe('loaded');
      expect(second.memory.entries()).toEqual(first.memory.entries());
    });

    it('starts empty when the file is missing', () => {
      const loaded = quietClassifier({ memoryFile: path.join(dir, 'memory.json') });
      expect(loaded.load().status).toBe('missing');
      expect(loaded.memory.size()).toBe(0);
    });

    it('warns about a corrupt file and keeps the current memory', () => {
      const file = path.join(dir, 'memory.json');
      fs.writeFileSync(file, '{"words": 12');
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const loaded = quietClassifier({ memoryFile: file });
      loaded.memory.add('words', 'hello', 0.1);
      const result = loaded.load();

      expect(result.status).toBe('corrupt');
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0][0]).startsWith(`Ignoring unreadable memory file ${file}: `)).toBe(true);
      expect(String(warn.mock.calls[0][0]).endsWith(' (keeping current memory)')).toBe(true);
      expect(loaded.list('words')).toEqual(['hello']);
    });

    it('saves to an explicit path', () => {
      const file = path.join(dir, 'other', 'memory.json');
      classifier.memory.add('words', 'hello', 0.1);
      classifier.save(file);
      expect(JSON.parse(fs.readFileSync(file, 'utf-8')).words).toEqual({ hello: 0.1 });
    });

    it('requires a file', () => {
      expect(() => classifier.save()).toThrow('No memory file configured');
    });
  });
});
