/**
 * Showcase application: flags in, exit code out
 */

import { parseArgs, helpText } from './cli.js';
import { getBoxStyle, getCellWidthPx, getEnabledSections, getGlyphMode, isColorEnabled } from './config/index.js';
import { createCapabilityQuery, type CapabilityQuery } from './glyphs/capability.js';
import { Screen, type ScreenOutput } from './renderer/Screen.js';
import { KeyReader, type KeySource } from './renderer/Keys.js';
import { Pager } from './renderer/components/Pager.js';
import { cursorShape } from './renderer/ansi.js';
import { only } from './showcase/builder.js';
import { buildDocument } from './showcase/document.js';
import { defaultSections } from './showcase/sections/index.js';
import { ViewportTracker, type ViewportDecoration } from './showcase/viewports.js';
import type { Section, SectionContext } from './showcase/types.js';
import { printDocument, printError, printSectionList } from './utils/console.js';
import { logAppError, logger, logStartup } from './utils/logger.js';
import { getCurrentVersion } from './utils/version.js';

export interface Terminal {
  stdout: ScreenOutput;
  stdin: KeySource;
}

const MAIN_VIEWPORT = 'main';

function createContext(
  width: number,
  canDisplay: CapabilityQuery,
  color: boolean,
  viewports: readonly ViewportDecoration[]
): SectionContext {
  return { width, canDisplay, color, boxStyle: getBoxStyle(), cellWidthPx: getCellWidthPx(), viewports };
}

/**
 * Sections to show. Ids given on the command line must all exist; stale ids
 * in the stored config are skipped with a warning.
 */
export function selectSections(
  all: readonly Section[],
  requested: readonly string[],
  configured: readonly string[]
): readonly Section[] {
  if (requested.length > 0) return only(all, requested);

  const known = new Set(all.map(section => section.id));
  const stale = configured.filter(id => !known.has(id));
  if (stale.length > 0) {
    logger.warn('Ignoring unknown sections from config', { sections: stale });
  }
  return only(all, configured.filter(id => known.has(id)));
}

async function runPager(
  terminal: Terminal,
  sections: readonly Section[],
  canDisplay: CapabilityQuery,
  color: boolean
): Promise<void> {
  const screen = new Screen({ canDisplay, output: terminal.stdout });
  const viewports = new ViewportTracker();
  const { width, height } = screen.getSize();
  viewports.dispatch({ type: 'opened', id: MAIN_VIEWPORT, width, height });

  const build = () =>
    buildDocument(sections, createContext(screen.getSize().width, canDisplay, color, viewports.decorations()));

  const pager = new Pager(screen, build(), terminal.stdout);
  const keys = new KeyReader(terminal.stdin, terminal.stdout);
  const redraw = () => {
    pager.draw();
    screen.render();
  };

  const unsubscribe = viewports.subscribe(() => {
    pager.setDocument(build());
    redraw();
  });
  screen.followResize((newWidth, newHeight) => {
    viewports.dispatch({ type: 'resized', id: MAIN_VIEWPORT, width: newWidth, height: newHeight });
  });

  screen.init();
  try {
    pager.draw();
    screen.fullRender();

    await new Promise<void>(resolve => {
      keys.onKey(event => {
        const action = pager.handleKey(event);
        if (action === 'redraw') redraw();
        if (action === 'quit') resolve();
      });
      keys.start();
    });
  } finally {
    keys.stop();
    terminal.stdout.write(cursorShape('default'));
    unsubscribe();
    screen.cleanup();
    viewports.dispatch({ type: 'closed', id: MAIN_VIEWPORT });
  }
}

async function main(args: readonly string[], terminal: Terminal): Promise<void> {
  const options = parseArgs(args);
  const version = getCurrentVersion();

  if (options.version) {
    console.log(`boxfall v${version}`);
    return;
  }
  if (options.help) {
    console.log(helpText());
    return;
  }

  const all = defaultSections();
  const sections = selectSections(all, options.sections, getEnabledSections());

  if (options.list) {
    printSectionList(all, new Set(sections.map(section => section.id)));
    return;
  }

  const glyphMode = options.glyphMode ?? getGlyphMode();
  const canDisplay = createCapabilityQuery(glyphMode);
  const interactive = !options.plain && Boolean(terminal.stdout.isTTY) && Boolean(terminal.stdin.isTTY);
  logStartup(version, { glyphMode, interactive, sections: sections.map(section => section.id) });

  if (interactive) {
    await runPager(terminal, sections, canDisplay, isColorEnabled());
    return;
  }

  const color = isColorEnabled() && Boolean(terminal.stdout.isTTY);
  const width = terminal.stdout.columns || 80;
  const viewports = new ViewportTracker();
  viewports.dispatch({ type: 'opened', id: MAIN_VIEWPORT, width, height: terminal.stdout.rows || 24 });

  const document = buildDocument(sections, createContext(width, canDisplay, color, viewports.decorations()));
  logger.info('Printing document', { lines: document.lines.length, fallbacks: document.fallbacks });
  printDocument(color ? document.lines : document.plain, terminal.stdout);
}

/**
 * Run the CLI. Errors are printed and logged; the result is the exit code.
 */
export async function run(
  args: readonly string[],
  terminal: Terminal = { stdout: process.stdout, stdin: process.stdin }
): Promise<number> {
  try {
    await main(args, terminal);
    return 0;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    printError(err.message);
    logAppError(err, 'cli');
    return 1;
  }
}
