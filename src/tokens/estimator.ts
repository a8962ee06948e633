/**
 * Token Estimator - approximate prompt size per model family.
 *
 * One base count from the cl100k_base encoding, scaled per model. The
 * numbers are estimates; each model's own tokenizer will differ somewhat.
 */

import { getEncoding } from 'js-tiktoken';

export const BASE_ENCODING = 'cl100k_base';

/** Model name -> estimated token count. Empty means no estimate is available. */
export type TokenReport = Record<string, number>;

export interface TokenCounter {
  count(text: string): number;
}

export interface ModelSpec {
  name: string;
  /** Applied to the base count, result floored */
  multiplier: number;
  maxContext: number;
}

export interface ModelTokenUsage {
  model: string;
  tokens: number;
  maxContext: number;
  usagePercent: number;
  remainingTokens: number;
}

export interface DocumentSummary {
  characters: number;
  lines: number;
  codeBlocks: number;
}

export const MODEL_SPECS: readonly ModelSpec[] = [
  { name: 'GPT-4', multiplier: 1.0, maxContext: 8192 },
  { name: 'GPT-3.5', multiplier: 1.0, maxContext: 4096 },
  { name: 'Claude', multiplier: 0.8, maxContext: 100_000 },
  { name: 'GPT-O1', multiplier: 1.1, maxContext: 4096 },
  { name: 'Ollama-Llama2-7B', multiplier: 0.9, maxContext: 4096 },
  { name: 'Ollama-Llama2-13B', multiplier: 0.85, maxContext: 4096 },
];

let defaultCounter: TokenCounter | undefined;

export function createTiktokenCounter(): TokenCounter {
  const encoding = getEncoding(BASE_ENCODING);
  return {
    // Special-token text is counted as ordinary text instead of throwing
    count: (text) => encoding.encode(text, [], []).length,
  };
}

function getDefaultCounter(): TokenCounter {
  defaultCounter ??= createTiktokenCounter();
  return defaultCounter;
}

/**
 * Per-model usage against each model's context window.
 * Returns [] (with a warning) when the tokenizer fails.
 */
export function analyzeTokens(text: string, counter?: TokenCounter): ModelTokenUsage[] {
  let baseline: number;
  try {
    baseline = (counter ?? getDefaultCounter()).count(text);
  } catch (error) {
    console.warn(`Warning: Token estimation unavailable: ${error instanceof Error ? error.message : error}`);
    return [];
  }

  return MODEL_SPECS.map(spec => {
    const tokens = Math.floor(baseline * spec.multiplier);
    return {
      model: spec.name,
      tokens,
      maxContext: spec.maxContext,
      usagePercent: spec.maxContext > 0 ? (tokens / spec.maxContext) * 100 : 0,
      remainingTokens: spec.maxContext - tokens,
    };
  });
}

/** Model name -> token count; {} when no estimate is available */
export function estimateTokens(text: string, counter?: TokenCounter): TokenReport {
  return Object.fromEntries(analyzeTokens(text, counter).map(usage => [usage.model, usage.tokens]));
}

/** Basic stats of a snapshot document (code blocks = fence lines / 2) */
export function summarizeDocument(text: string): DocumentSummary {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();

  const fences = lines.filter(line => line.trim().startsWith('```')).length;

  return {
    characters: text.length,
    lines: lines.length,
    codeBlocks: Math.floor(fences / 2),
  };
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}
