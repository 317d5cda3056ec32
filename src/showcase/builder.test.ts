import { describe, it, expect } from 'vitest';
import { ShowcaseBuilder, only } from './builder.js';
import { ShowcaseError } from '../errors.js';
import { line, type Section } from './types.js';

const section = (id: string, title = id.toUpperCase()): Section => ({
  id,
  title,
  description: `About ${id}`,
  render: () => [line(id)],
});

describe('ShowcaseBuilder', () => {
  it('should keep sections in the order they were added', () => {
    const sections = ShowcaseBuilder.create().add(section('a')).add(section('b')).add(section('c')).build();
    expect(sections.map(s => s.id)).toEqual(['a', 'b', 'c']);
  });

  it('should not change a builder when adding', () => {
    const base = ShowcaseBuilder.create().add(section('a'));
    const extended = base.add(section('b'));
    expect(base.build().map(s => s.id)).toEqual(['a']);
    expect(extended.build().map(s => s.id)).toEqual(['a', 'b']);
  });

  it('should freeze the built list and its sections', () => {
    const sections = ShowcaseBuilder.create().add(section('a')).build();
    expect(Object.isFrozen(sections)).toBe(true);
    expect(Object.isFrozen(sections[0])).toBe(true);
  });

  it('should reject duplicate ids', () => {
    const builder = ShowcaseBuilder.create().add(section('a'));
    expect(() => builder.add(section('a'))).toThrow(ShowcaseError);
    expect(() => builder.add(section('a'))).toThrow('Duplicate section id "a"');
  });

  it('should reject empty ids and titles', () => {
    expect(() => ShowcaseBuilder.create().add(section(' '))).toThrow('Section id cannot be empty');
    expect(() => ShowcaseBuilder.create().add(section('x', ''))).toThrow('Section "x" has no title');
  });

  describe('only', () => {
    const sections = ShowcaseBuilder.create().add(section('a')).add(section('b')).add(section('c')).build();

    it('should keep showcase order regardless of the requested order', () => {
      expect(only(sections, ['c', 'a']).map(s => s.id)).toEqual(['a', 'c']);
    });

    it('should return everything for an empty selection', () => {
      expect(only(sections, [])).toBe(sections);
    });

    it('should name unknown sections', () => {
      expect(() => only(sections, ['a', 'zz'])).toThrow('Unknown section: zz');
      expect(() => only(sections, ['x', 'y'])).toThrow('Unknown sections: x, y');
    });
  });
});
