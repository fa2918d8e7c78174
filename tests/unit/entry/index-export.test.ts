import { describe, it, expect } from 'vitest';

describe('src/index exports', () => {
  it('can be imported without side effects', async () => {
    const mod = await import('../../../src/index.js');

    expect(mod).toHaveProperty('DocstringPipeline');
    expect(mod).toHaveProperty('extractDeclarations');
    expect(mod).toHaveProperty('renderDocstring');
    expect(mod).toHaveProperty('applyPatches');
  });
});
