import { describe, it, expect } from 'vitest';
import { getCurrentVersion } from './version.js';

describe('getCurrentVersion', () => {
  it('should read the version from package.json', () => {
    expect(getCurrentVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
