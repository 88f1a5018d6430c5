import { describe, it, expect } from 'vitest';
import { program } from '../../src/cli/program.js';

describe('CLI program', () => {
  it('registers every command', () => {
    expect(program.commands.map((command) => command.name())).toEqual([
      'embed',
      'tokenize',
      'similarity',
      'search',
      'documents',
      'ingest',
      'config',
    ]);
  });

  it('is named vecrank', () => {
    expect(program.name()).toBe('vecrank');
    expect(program.version()).toBe('0.1.0');
  });

  it('declares the search options', () => {
    const search = program.commands.find((command) => command.name() === 'search');

    expect(search?.options.map((option) => option.long)).toEqual([
      '--top-k',
      '--db',
      '--include-embeddings',
      '--json',
    ]);
  });
});
