import { describe, it, expect, vi } from 'vitest';
import {
  createEmbeddingPipeline,
  embed,
  embedMany,
  tokenizeText,
} from '../../src/embedding/pipeline.js';
import { InvalidArgumentError } from '../../src/errors.js';
import { bagOfIdsRunner, wordVocabulary } from '../helpers/fakes.js';

describe('createEmbeddingPipeline', () => {
  it('fills in default options', () => {
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner());

    expect(pipeline.options).toEqual({
      maxLength: 512,
      pooling: 'cls',
      hiddenStateOutput: 'last_hidden_state',
    });
    expect(Object.isFrozen(pipeline.options)).toBe(true);
  });
});

describe('tokenizeText', () => {
  it('applies the pipeline length limit', () => {
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner(), { maxLength: 3 });

    const sequence = tokenizeText(pipeline, 'one two three');

    expect(sequence.ids).toHaveLength(3);
    expect(sequence.truncated).toBe(true);
  });
});

describe('embed', () => {
  it('pools the first position and normalizes it', async () => {
    // "a" → native [1, 100, 2] → remapped [0, 101, 2] → buckets 0, 1, 2
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner(4));

    const embedding = await embed(pipeline, 'a');

    const third = 1 / Math.sqrt(3);
    expect(embedding).toHaveLength(4);
    expect(embedding[0]).toBeCloseTo(third, 6);
    expect(embedding[1]).toBeCloseTo(third, 6);
    expect(embedding[2]).toBeCloseTo(third, 6);
    expect(embedding[3]).toBe(0);
  });

  it('averages positions with mean pooling', async () => {
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner(4), {
      pooling: 'mean',
    });

    const embedding = await embed(pipeline, 'a');

    expect(embedding[0]).toBeCloseTo(1 / 3, 6);
    expect(embedding[1]).toBeCloseTo(2 / 3, 6);
    expect(embedding[2]).toBeCloseTo(2 / 3, 6);
    expect(embedding[3]).toBe(0);
  });

  it('feeds remapped ids and requests only the hidden state', async () => {
    const runner = bagOfIdsRunner(4);
    const run = vi.spyOn(runner, 'run');
    const pipeline = createEmbeddingPipeline(wordVocabulary(), runner);

    await embed(pipeline, 'a');

    expect(run).toHaveBeenCalledTimes(1);
    const [feeds, wanted] = run.mock.calls[0];
    expect(wanted).toEqual(['last_hidden_state']);
    const inputIds = feeds.input_ids;
    if (inputIds.type !== 'int64') throw new Error('expected int64 input_ids');
    expect(Array.from(inputIds.data)).toEqual([0n, 101n, 2n]);
    expect(inputIds.dims).toEqual([1, 3]);
  });

  it('truncates long inputs before inference', async () => {
    const runner = bagOfIdsRunner(4);
    const pipeline = createEmbeddingPipeline(wordVocabulary(), runner, { maxLength: 2 });

    await embed(pipeline, 'a b c d');

    expect(runner.calls[0].input_ids.dims).toEqual([1, 2]);
  });

  it('is deterministic', async () => {
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner(8));

    const first = await embed(pipeline, 'hello world');
    const second = await embed(pipeline, 'hello world');

    expect(Array.from(first)).toEqual(Array.from(second));
  });

  it('rejects empty text without running the model', async () => {
    const runner = bagOfIdsRunner();
    const pipeline = createEmbeddingPipeline(wordVocabulary(), runner);

    await expect(embed(pipeline, '')).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(runner.calls).toHaveLength(0);
  });
});

describe('embedMany', () => {
  it('returns one embedding per text in input order', async () => {
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner(8));
    const texts = ['alpha', 'beta gamma', 'delta'];

    const embeddings = await embedMany(pipeline, texts);

    expect(embeddings).toHaveLength(3);
    for (let i = 0; i < texts.length; i++) {
      const single = await embed(pipeline, texts[i]);
      expect(Array.from(embeddings[i])).toEqual(Array.from(single));
    }
  });

  it('runs inferences concurrently', async () => {
    const runner = bagOfIdsRunner(4, 5);
    const pipeline = createEmbeddingPipeline(wordVocabulary(), runner);

    await embedMany(pipeline, ['a', 'b', 'c']);

    expect(runner.maxInFlight()).toBe(3);
  });

  it('rejects the whole batch when one text fails', async () => {
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner());

    await expect(embedMany(pipeline, ['fine', ''])).rejects.toThrow('Text cannot be null or empty');
  });

  it('returns an empty array for no texts', async () => {
    const pipeline = createEmbeddingPipeline(wordVocabulary(), bagOfIdsRunner());

    await expect(embedMany(pipeline, [])).resolves.toEqual([]);
  });
});
