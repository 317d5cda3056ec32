/**
 * Ordered, immutable section registration
 */

import { ShowcaseError } from '../errors.js';
import type { Section } from './types.js';

export class ShowcaseBuilder {
  private constructor(private readonly sections: readonly Section[]) {}

  static create(): ShowcaseBuilder {
    return new ShowcaseBuilder([]);
  }

  /**
   * New builder with `section` appended
   */
  add(section: Section): ShowcaseBuilder {
    if (!section.id.trim()) {
      throw new ShowcaseError('Section id cannot be empty');
    }
    if (!section.title.trim()) {
      throw new ShowcaseError(`Section "${section.id}" has no title`);
    }
    if (this.sections.some(existing => existing.id === section.id)) {
      throw new ShowcaseError(`Duplicate section id "${section.id}"`);
    }
    return new ShowcaseBuilder([...this.sections, Object.freeze({ ...section })]);
  }

  build(): readonly Section[] {
    return Object.freeze([...this.sections]);
  }
}

/**
 * Keep only the listed sections, in showcase order
 */
export function only(sections: readonly Section[], ids: readonly string[]): readonly Section[] {
  const known = new Set(sections.map(section => section.id));
  const unknown = ids.filter(id => !known.has(id));
  if (unknown.length > 0) {
    throw new ShowcaseError(`Unknown section${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')}`);
  }
  if (ids.length === 0) return sections;

  const wanted = new Set(ids);
  return Object.freeze(sections.filter(section => wanted.has(section.id)));
}
