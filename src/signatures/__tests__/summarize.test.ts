/**
 * Tests for summarizeFile fault handling
 */

import { describe, it, expect, vi } from 'vitest';
import { summarizeFile } from '../processor.js';
import type { Logger } from '../../utils/logger.js';

vi.mock('../classifier.js', () => ({
  classifyFile: (path: string) => {
    if (path.endsWith('.boom')) {
      throw new Error('classifier exploded');
    }
    return { category: 'line-count-only', extension: 'txt' };
  },
}));

function createLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return {
    warn: vi.fn(),
    debug: vi.fn(),
  };
}

describe('summarizeFile', () => {
  it('returns the processed view when nothing fails', () => {
    const logger = createLogger();
    expect(summarizeFile('a.txt', 'one\ntwo', logger)).toBe('[lines:2]');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('returns the original content and warns when processing throws', () => {
    const logger = createLogger();
    const content = 'raw content';

    expect(summarizeFile('broken.boom', content, logger)).toBe(content);
    expect(logger.warn).toHaveBeenCalledWith(
      'Could not extract signatures from broken.boom: classifier exploded'
    );
  });
});
