import { describe, it, expect } from 'vitest';
import { getCompletionScript, SUPPORTED_SHELLS } from '../../src/completions.js';

describe('completions', () => {
  it('ships a script for every supported shell', () => {
    for (const shell of SUPPORTED_SHELLS) {
      const script = getCompletionScript(shell);
      expect(script).not.toBeNull();
      expect(script).toContain('codepaste');
      expect(script).toContain('snap');
    }
  });

  it('starts the zsh script with a compdef line', () => {
    expect(getCompletionScript('zsh')?.split('\n')[0]).toBe('#compdef codepaste');
  });

  it('lists exactly the shells with shipped scripts', () => {
    expect([...SUPPORTED_SHELLS]).toEqual(['bash', 'zsh', 'fish']);
  });
});
