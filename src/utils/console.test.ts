import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { printError, printSectionList, printDocument } from './console.js';
import { line, type Section } from '../showcase/types.js';

function section(id: string, title: string): Section {
  return { id, title, description: '', render: () => [line('')] };
}

describe('console output', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print errors to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    printError('Unknown section: zz');
    expect(spy).toHaveBeenCalledWith('Error: Unknown section: zz');
  });

  it('should list sections with shown ones marked', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    printSectionList([section('image', 'Image'), section('gutter', 'Gutter markers')], new Set(['gutter']));
    expect(spy.mock.calls).toEqual([['  image   Image'], ['* gutter  Gutter markers']]);
  });

  it('should write document lines to stdout', () => {
    const spy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    printDocument(['a', 'b']);
    expect(spy).toHaveBeenCalledWith('a\nb\n');
  });
});
