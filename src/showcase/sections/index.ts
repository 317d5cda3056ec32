import { ShowcaseBuilder } from '../builder.js';
import type { Section } from '../types.js';
import { alignmentSection } from './alignment.js';
import { boxDrawingSection } from './boxDrawing.js';
import { transliterationSection } from './transliteration.js';
import { imageSection } from './image.js';
import { gutterSection } from './gutter.js';
import { cursorShapesSection } from './cursorShapes.js';
import { viewportsSection } from './viewports.js';

/**
 * The built-in sections, in display order
 */
export function defaultSections(): readonly Section[] {
  return ShowcaseBuilder.create()
    .add(alignmentSection)
    .add(boxDrawingSection)
    .add(transliterationSection)
    .add(imageSection)
    .add(gutterSection)
    .add(cursorShapesSection)
    .add(viewportsSection)
    .build();
}
