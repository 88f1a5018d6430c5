import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  documentToJson,
  formatScore,
  formatSearchResults,
  formatVectorPreview,
} from '../../src/cli/format.js';
import type { StoredDocument } from '../../src/persistence/repository.js';

const document: StoredDocument = {
  id: 7,
  question: 'Do you ship abroad?',
  answer: 'Yes to most countries',
  combinedText: 'Do you ship abroad? : Yes to most countries',
  embedding: Float32Array.from([0.5, -0.25]),
  embeddingDimensions: 2,
  createdAt: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
};

describe('format', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('previews the leading components of a vector', () => {
    expect(formatVectorPreview(Float32Array.from([0.5, -0.25, 0.125]), 2)).toBe(
      '[0.5000, -0.2500, …] (3 dims)',
    );
    expect(formatVectorPreview([1, 0])).toBe('[1.0000, 0.0000] (2 dims)');
  });

  it('formats scores with four decimals', () => {
    expect(formatScore(0.87654)).toBe('0.8765');
  });

  it('omits embeddings from JSON unless requested', () => {
    expect(documentToJson(document, false)).toEqual({
      id: 7,
      question: 'Do you ship abroad?',
      answer: 'Yes to most countries',
      combinedText: 'Do you ship abroad? : Yes to most countries',
      embeddingDimensions: 2,
      createdAt: '2024-01-02T03:04:05.000Z',
    });
    expect(documentToJson(document, true).embedding).toEqual([0.5, -0.25]);
  });

  it('renders ranked results', () => {
    const output = formatSearchResults([{ document, score: 0.91234 }]);

    expect(output).toBe('1. [0.9123] Do you ship abroad? (#7)\n   Yes to most countries');
  });
});
