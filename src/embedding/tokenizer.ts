/**
 * Tokenizer adapter for XLM-R style encoders (multilingual-e5 family).
 *
 * Converts raw text into subword token ids using a fixed vocabulary artifact,
 * applies the encoder-specific id remapping and truncates to the model's
 * maximum sequence length.
 *
 * CRITICAL: The encoder's embedding table reserves index 0 for the start
 * marker, while a native sentencepiece vocabulary numbers <unk>=0, <s>=1,
 * </s>=2. Feeding native ids unchanged shifts every embedding lookup by one
 * row and silently produces garbage vectors.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import {
  InvalidArgumentError,
  ModelArtifactMissingError,
  TokenizerUnavailableError,
} from '../errors.js';

/** Maximum number of token ids passed to the encoder. */
export const MAX_SEQUENCE_LENGTH = 512;

/** Sequence-start marker emitted by the tokenizer. */
export const START_MARKER = '<s>';

/** Sequence-end marker emitted by the tokenizer. */
export const END_MARKER = '</s>';

/**
 * A subword piece and its id.
 */
export interface SubwordPiece {
  readonly piece: string;
  readonly id: number;
}

/**
 * How a vocabulary numbers its pieces.
 *
 * - 'sentencepiece': native numbering (<s> is not at index 0). Ids are remapped.
 * - 'fairseq': the start marker already sits at index 0 and ordinary pieces
 *   are already offset by one (stock Hugging Face XLM-R exports). Ids pass
 *   through unchanged.
 */
export type VocabularyIdLayout = 'sentencepiece' | 'fairseq';

/**
 * A loaded tokenizer vocabulary.
 *
 * `encode` returns pieces with the vocabulary's own ids, including the start
 * and end markers the tokenizer adds around the text.
 */
export interface SubwordVocabulary {
  readonly idLayout: VocabularyIdLayout;
  encode(text: string): SubwordPiece[];
}

/**
 * Immutable tokenization result.
 */
export interface TokenSequence {
  /** Remapped (piece, id) pairs, at most maxLength long */
  readonly tokens: readonly SubwordPiece[];

  /** The ids of `tokens`, in order */
  readonly ids: readonly number[];

  /** True when the untruncated sequence exceeded maxLength */
  readonly truncated: boolean;
}

/**
 * Special marker strings used by the remapping rule.
 */
export interface MarkerOptions {
  startMarker?: string;
  endMarker?: string;
}

export interface TokenizeOptions extends MarkerOptions {
  /** Maximum ids to keep (default: 512) */
  maxLength?: number;
}

/**
 * Remaps native sentencepiece ids to the encoder's embedding-table ids.
 *
 * Rule:
 * - the first token, when it is the start marker, becomes 0
 * - an end marker keeps its native id
 * - every other token gets native id + 1
 *
 * @param pieces - Tokens with native ids
 * @param markers - Marker strings (default: <s> and </s>)
 * @returns Remapped ids, same length as `pieces`
 *
 * @example
 * ```typescript
 * remapTokenIds([
 *   { piece: '<s>', id: 1 },
 *   { piece: '▁Hello', id: 35377 },
 *   { piece: '</s>', id: 2 },
 * ]);
 * // => [0, 35378, 2]
 * ```
 */
export function remapTokenIds(
  pieces: readonly SubwordPiece[],
  markers: MarkerOptions = {},
): number[] {
  const startMarker = markers.startMarker ?? START_MARKER;
  const endMarker = markers.endMarker ?? END_MARKER;

  return pieces.map((token, index) => {
    if (index === 0 && token.piece === startMarker) return 0;
    if (token.piece === endMarker) return token.id;
    return token.id + 1;
  });
}

/**
 * Tokenizes text into an immutable, remapped and truncated token sequence.
 *
 * Truncation keeps the first `maxLength` ids. No end marker is re-inserted,
 * so a truncated sequence ends mid-text.
 *
 * @param vocabulary - Loaded vocabulary from loadVocabulary()
 * @param text - Input text (must be non-empty)
 * @param options - Length limit and marker overrides
 * @returns Token sequence with `truncated` flag
 * @throws InvalidArgumentError if text is empty or maxLength is not a positive integer
 */
export function tokenize(
  vocabulary: SubwordVocabulary,
  text: string,
  options: TokenizeOptions = {},
): TokenSequence {
  if (typeof text !== 'string' || text.length === 0) {
    throw new InvalidArgumentError('Text cannot be null or empty');
  }

  const maxLength = options.maxLength ?? MAX_SEQUENCE_LENGTH;
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new InvalidArgumentError(`maxLength must be a positive integer, got ${maxLength}`);
  }

  const pieces = vocabulary.encode(text);
  const ids =
    vocabulary.idLayout === 'sentencepiece'
      ? remapTokenIds(pieces, options)
      : pieces.map((token) => token.id);

  const truncated = ids.length > maxLength;
  const keptIds = truncated ? ids.slice(0, maxLength) : ids;
  const tokens = keptIds.map((id, index) => Object.freeze({ piece: pieces[index].piece, id }));

  return Object.freeze({
    tokens: Object.freeze(tokens),
    ids: Object.freeze(keptIds),
    truncated,
  });
}

/**
 * Shape of the parts of tokenizer.json used to map ids back to pieces.
 * Unigram models store `vocab` as [piece, score] pairs (index = id);
 * BPE/WordPiece models store a piece → id record.
 */
const TokenizerFileSchema = z
  .object({
    model: z
      .object({
        type: z.string().optional(),
        vocab: z.union([
          z.array(z.tuple([z.string(), z.number()])),
          z.record(z.string(), z.number()),
        ]),
      })
      .passthrough(),
    added_tokens: z.array(z.object({ id: z.number(), content: z.string() }).passthrough()).optional(),
  })
  .passthrough();

const TokenizerConfigSchema = z.record(z.string(), z.unknown());

type TokenizerFile = z.infer<typeof TokenizerFileSchema>;

/**
 * Builds an id → piece lookup from tokenizer.json contents.
 */
function buildPieceTable(file: TokenizerFile): string[] {
  const table: string[] = [];
  const vocab = file.model.vocab;

  if (Array.isArray(vocab)) {
    vocab.forEach(([piece], id) => {
      table[id] = piece;
    });
  } else {
    for (const [piece, id] of Object.entries(vocab)) {
      table[id] = piece;
    }
  }

  for (const token of file.added_tokens ?? []) {
    table[token.id] = token.content;
  }

  return table;
}

/**
 * Creates a vocabulary from an id encoder and an id → piece table.
 *
 * The layout is detected from the table: a start marker at index 0 means the
 * ids are already in the encoder's numbering.
 *
 * @param encodeIds - Function returning the vocabulary's ids for a text (markers included)
 * @param pieceTable - Piece string for each id
 * @param markers - Marker strings (default: <s> and </s>)
 */
export function createSubwordVocabulary(
  encodeIds: (text: string) => number[],
  pieceTable: readonly string[],
  markers: MarkerOptions = {},
): SubwordVocabulary {
  const startMarker = markers.startMarker ?? START_MARKER;
  const idLayout: VocabularyIdLayout = pieceTable[0] === startMarker ? 'fairseq' : 'sentencepiece';

  return {
    idLayout,
    encode(text) {
      return encodeIds(text).map((id) => ({ piece: pieceTable[id] ?? '', id }));
    },
  };
}

/**
 * Loads the tokenizer artifact.
 *
 * Accepts a path to tokenizer.json or to the directory holding it. A sibling
 * tokenizer_config.json is read when present. Tokenization itself is done by
 * a Transformers.js PreTrainedTokenizer built from the file.
 *
 * This is a startup-time operation: failures here mean the process must not
 * serve traffic.
 *
 * @param tokenizerPath - tokenizer.json path or its directory
 * @param markers - Marker strings (default: <s> and </s>)
 * @returns Loaded vocabulary
 * @throws ModelArtifactMissingError if tokenizer.json does not exist
 * @throws TokenizerUnavailableError if the file cannot be parsed or built
 */
export async function loadVocabulary(
  tokenizerPath: string,
  markers: MarkerOptions = {},
): Promise<SubwordVocabulary> {
  const filePath = tokenizerPath.endsWith('.json')
    ? tokenizerPath
    : join(tokenizerPath, 'tokenizer.json');

  if (!existsSync(filePath)) {
    throw new ModelArtifactMissingError(filePath, `Tokenizer file not found at ${filePath}`);
  }

  const raw = await readJsonFile(filePath);
  const parsed = TokenizerFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TokenizerUnavailableError(
      `Tokenizer file at ${filePath} has no usable model vocabulary: ${parsed.error.issues[0]?.message ?? 'invalid format'}`,
    );
  }

  const configPath = join(dirname(filePath), 'tokenizer_config.json');
  let tokenizerConfig: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    const config = TokenizerConfigSchema.safeParse(await readJsonFile(configPath));
    if (!config.success) {
      throw new TokenizerUnavailableError(`Tokenizer config at ${configPath} is not a JSON object`);
    }
    tokenizerConfig = config.data;
  }

  // Dynamic import: Transformers.js pulls in onnxruntime and sharp at load time
  const { PreTrainedTokenizer } = await import('@huggingface/transformers');

  let tokenizer: InstanceType<typeof PreTrainedTokenizer>;
  try {
    tokenizer = new PreTrainedTokenizer(parsed.data, tokenizerConfig);
  } catch (error) {
    throw new TokenizerUnavailableError(
      `Failed to create tokenizer from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  return createSubwordVocabulary((text) => tokenizer.encode(text), buildPieceTable(parsed.data), markers);
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const value: unknown = JSON.parse(content);
    return value;
  } catch (error) {
    throw new TokenizerUnavailableError(
      `Failed to read tokenizer file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
