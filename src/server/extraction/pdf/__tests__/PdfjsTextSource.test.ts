import { describe, it, expect } from 'vitest';
import { SourceUnavailableError } from '../../../types/errors.js';
import { PdfjsTextSource } from '../PdfjsTextSource.js';

describe('PdfjsTextSource', () => {
  const source = new PdfjsTextSource();

  it('rejects an empty document', async () => {
    const read = source.readPage(Buffer.alloc(0), 0);

    await expect(read).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(read).rejects.toThrow('Source unavailable (pdf): empty document');
  });
});
