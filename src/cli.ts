/**
 * Command line parsing
 */

import { ShowcaseError } from './errors.js';
import type { GlyphMode } from './glyphs/capability.js';

export interface CliOptions {
  help: boolean;
  version: boolean;
  list: boolean;
  plain: boolean;
  /** Set by --ascii or --unicode; otherwise the configured mode applies */
  glyphMode?: GlyphMode;
  sections: string[];
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, version: false, list: false, plain: false, sections: [] };

  const setGlyphMode = (mode: GlyphMode) => {
    if (options.glyphMode && options.glyphMode !== mode) {
      throw new ShowcaseError('Options --ascii and --unicode cannot be combined');
    }
    options.glyphMode = mode;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--section=')) {
      options.sections.push(arg.slice('--section='.length));
      continue;
    }

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--version':
      case '-v':
        options.version = true;
        break;
      case '--list':
        options.list = true;
        break;
      case '--plain':
        options.plain = true;
        break;
      case '--ascii':
        setGlyphMode('ascii');
        break;
      case '--unicode':
        setGlyphMode('unicode');
        break;
      case '--section':
      case '-s': {
        const id = args[i + 1];
        if (id === undefined || id.startsWith('-')) {
          throw new ShowcaseError(`Option ${arg} needs a section id`);
        }
        options.sections.push(id);
        i++;
        break;
      }
      default:
        throw new ShowcaseError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

export function helpText(): string {
  return `
boxfall - terminal glyph showcase with ASCII fallback

Usage:
  boxfall                     Open the showcase pager
  boxfall --plain             Print the showcase and exit
  boxfall --list              List section ids
  boxfall --section <id>      Show only this section (repeatable)
  boxfall --ascii             Draw with ASCII only
  boxfall --unicode           Assume every glyph can be displayed
  boxfall --version           Show version
  boxfall --help              Show this help

Environment:
  BOXFALL_GLYPHS    auto, unicode or ascii
  BOXFALL_LOG_DIR   Log directory (default ~/.boxfall/logs)
  NO_COLOR          Disable colour

Pager keys:
  j/k, arrows       Scroll
  space/b           Page down/up
  g/G               Top/bottom
  n/p               Next/previous section
  0-6               Cursor shape
  q, Esc            Quit
`;
}
