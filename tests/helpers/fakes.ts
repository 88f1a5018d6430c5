/**
 * In-process stand-ins for the tokenizer artifact and the ONNX session.
 */

import type { SubwordVocabulary } from '../../src/embedding/tokenizer.js';
import type { InferenceRunner, TensorMap } from '../../src/runtime/types.js';

/** Native id for a whole word: sum of its code points, past the three specials. */
export function wordId(word: string): number {
  let sum = 0;
  for (const char of word) {
    sum += char.codePointAt(0) ?? 0;
  }
  return sum + 3;
}

/**
 * Whitespace "tokenizer" in native sentencepiece numbering:
 * <s>=1, </s>=2, each word → wordId(word).
 */
export function wordVocabulary(): SubwordVocabulary {
  return {
    idLayout: 'sentencepiece',
    encode(text) {
      const words = text.split(/\s+/).filter(Boolean);
      return [
        { piece: '<s>', id: 1 },
        ...words.map((word) => ({ piece: `▁${word}`, id: wordId(word) })),
        { piece: '</s>', id: 2 },
      ];
    },
  };
}

export interface RecordingRunner extends InferenceRunner {
  readonly calls: TensorMap[];
  readonly maxInFlight: () => number;
}

/**
 * Fake encoder producing last_hidden_state [1, L, hiddenSize].
 *
 * Row 0 is a histogram of every input id bucketed by `id % hiddenSize`, so
 * first-token pooling depends on the whole text. Every later row is the
 * one-hot bucket of its own id.
 */
export function bagOfIdsRunner(hiddenSize = 4, delayMs = 0): RecordingRunner {
  const calls: TensorMap[] = [];
  let inFlight = 0;
  let peak = 0;

  return {
    calls,
    maxInFlight: () => peak,
    async run(inputs) {
      calls.push(inputs);
      inFlight++;
      peak = Math.max(peak, inFlight);
      try {
        if (delayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, delayMs));
        }

        const ids = inputs.input_ids;
        if (!ids || ids.type !== 'int64') {
          throw new Error('input_ids missing');
        }

        const length = ids.data.length;
        const data = new Float32Array(length * hiddenSize);
        for (let position = 0; position < length; position++) {
          const bucket = Number(ids.data[position] % BigInt(hiddenSize));
          data[bucket] += 1;
          if (position > 0) {
            data[position * hiddenSize + bucket] = 1;
          }
        }

        return {
          last_hidden_state: { type: 'float32', data, dims: [1, length, hiddenSize] },
        };
      } finally {
        inFlight--;
      }
    },
  };
}

/**
 * Minimal Unigram tokenizer.json with a Metaspace pre-tokenizer and
 * <s> … </s> post-processing. Knows "▁Hello" and "▁world".
 *
 * - 'sentencepiece': <unk>=0, <s>=1, </s>=2, ▁Hello=3, ▁world=4
 * - 'fairseq': <s>=0, <pad>=1, </s>=2, <unk>=3, ▁Hello=4, ▁world=5
 */
export function unigramTokenizerJson(layout: 'sentencepiece' | 'fairseq'): object {
  const specials =
    layout === 'fairseq' ? ['<s>', '<pad>', '</s>', '<unk>'] : ['<unk>', '<s>', '</s>'];
  const vocab: [string, number][] = [
    ...specials.map((piece): [string, number] => [piece, 0]),
    ['▁Hello', -1],
    ['▁world', -1],
  ];

  return {
    version: '1.0',
    truncation: null,
    padding: null,
    added_tokens: specials.map((content, id) => ({
      id,
      content,
      single_word: false,
      lstrip: false,
      rstrip: false,
      normalized: false,
      special: true,
    })),
    normalizer: null,
    pre_tokenizer: {
      type: 'Metaspace',
      replacement: '▁',
      add_prefix_space: true,
      prepend_scheme: 'always',
    },
    post_processor: {
      type: 'RobertaProcessing',
      sep: ['</s>', specials.indexOf('</s>')],
      cls: ['<s>', specials.indexOf('<s>')],
      trim_offsets: true,
      add_prefix_space: true,
    },
    decoder: null,
    model: {
      type: 'Unigram',
      unk_id: specials.indexOf('<unk>'),
      vocab,
    },
  };
}
