import { existsSync, readFileSync } from 'fs';
import { basename, resolve } from 'path';
import { defaultOutputName } from '../output.js';
import {
  analyzeTokens,
  formatCount,
  summarizeDocument,
  type DocumentSummary,
  type ModelTokenUsage,
  type TokenCounter,
} from '../tokens/estimator.js';

export interface TokensCommandResult {
  file: string;
  summary: DocumentSummary;
  /** Empty when the tokenizer failed */
  usage: ModelTokenUsage[];
}

/**
 * Analyze a snapshot file. Without a file name, looks for
 * "<cwd name>_source.md" in the CWD.
 */
export function runTokensCommand(file: string | undefined, cwd: string = process.cwd(), counter?: TokenCounter): TokensCommandResult {
  const target = resolve(cwd, file ?? defaultOutputName(cwd));

  if (!existsSync(target)) {
    throw new Error(`No project snapshot found at '${file ?? basename(target)}'.\nRun \`codepaste snap\` or provide a file name.`);
  }

  const content = readFileSync(target, 'utf-8');
  return {
    file: target,
    summary: summarizeDocument(content),
    usage: analyzeTokens(content, counter),
  };
}

export function formatTokensReport(result: TokensCommandResult): string[] {
  const { summary } = result;
  const lines = [
    'Project File Statistics',
    `  • File Name: ${basename(result.file)}`,
    `  • Characters: ${formatCount(summary.characters)}`,
    `  • Lines: ${formatCount(summary.lines)}`,
    `  • Code Blocks: ${summary.codeBlocks}`,
    '',
    'Model-Specific Token Estimates:',
  ];

  if (result.usage.length === 0) {
    lines.push('  No token estimate available.');
    return lines;
  }

  for (const usage of result.usage) {
    lines.push(`  • ${usage.model}: ${formatCount(usage.tokens)} tokens`);
    lines.push(`     ↳ Max Context: ${formatCount(usage.maxContext)}  |  Usage: ${usage.usagePercent.toFixed(1)}%  |  Remaining: ${formatCount(usage.remainingTokens)}`);
  }

  lines.push('', 'Note: All values are approximate and may vary by actual model version or usage.');
  return lines;
}
