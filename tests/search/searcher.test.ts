import { describe, it, expect } from 'vitest';
import { searchDocuments } from '../../src/search/searcher.js';

interface Doc {
  id: number;
  embedding: number[];
}

// Unit vectors at decreasing angles from the query [1, 0]
const documents: Doc[] = [
  { id: 1, embedding: [0, 1] },
  { id: 2, embedding: [1, 0] },
  { id: 3, embedding: [0.6, 0.8] },
  { id: 4, embedding: [-1, 0] },
  { id: 5, embedding: [0.8, 0.6] },
];
const query = [1, 0];

describe('searchDocuments', () => {
  it('returns the top K documents by descending similarity', () => {
    const results = searchDocuments(query, documents, 3);

    expect(results.map((r) => r.document.id)).toEqual([2, 5, 3]);
    expect(results[0].score).toBe(1);
    expect(results[1].score).toBeCloseTo(0.8, 6);
    expect(results[2].score).toBeCloseTo(0.6, 6);
  });

  it('returns every document when K exceeds the set', () => {
    const results = searchDocuments(query, documents, 10);

    expect(results.map((r) => r.document.id)).toEqual([2, 5, 3, 1, 4]);
    expect(results[4].score).toBe(-1);
  });

  it('returns an empty list for an empty set', () => {
    expect(searchDocuments(query, [], 5)).toEqual([]);
  });

  it('keeps input order for equal scores', () => {
    const ties: Doc[] = [
      { id: 10, embedding: [0, 1] },
      { id: 11, embedding: [1, 0] },
      { id: 12, embedding: [0, -1] },
      { id: 13, embedding: [2, 0] },
    ];

    const results = searchDocuments(query, ties, 4);

    expect(results.map((r) => r.document.id)).toEqual([11, 13, 10, 12]);
  });

  it('returns the same ranking on repeated calls', () => {
    const first = searchDocuments(query, documents, 5);
    const second = searchDocuments(query, documents, 5);

    expect(second).toEqual(first);
  });

  it('does not reorder the input', () => {
    const input = [...documents];

    searchDocuments(query, input, 5);

    expect(input.map((d) => d.id)).toEqual([1, 2, 3, 4, 5]);
  });

  it.each([0, -1, 2.5])('rejects topK %s', (topK) => {
    expect(() => searchDocuments(query, documents, topK)).toThrow(
      `topK must be a positive integer, got ${topK}`,
    );
  });

  it('throws when a document has a different dimensionality', () => {
    expect(() => searchDocuments(query, [{ id: 1, embedding: [1, 0, 0] }], 1)).toThrow(
      'Vectors must have the same dimensions (got 2 and 3)',
    );
  });
});
