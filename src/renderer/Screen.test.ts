import { describe, it, expect, vi } from 'vitest';
import { Screen, type ScreenOutput } from './Screen.js';
import { RenderError, ProbeUnavailableError } from '../errors.js';
import { asciiQuery } from '../glyphs/capability.js';

function createOutput(): ScreenOutput & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
  };
}

describe('Screen', () => {
  it('should take its size from options', () => {
    const screen = new Screen({ width: 10, height: 3, output: createOutput() });
    expect(screen.getSize()).toEqual({ width: 10, height: 3 });
  });

  it('should fall back to the output dimensions', () => {
    const output = { ...createOutput(), columns: 42, rows: 7 };
    const screen = new Screen({ output });
    expect(screen.getSize()).toEqual({ width: 42, height: 7 });
  });

  it('should write text and report trimmed lines', () => {
    const screen = new Screen({ width: 10, height: 2, output: createOutput() });
    screen.write(2, 0, 'hello');
    expect(screen.toLines()).toEqual(['  hello', '']);
  });

  it('should clip text at the right edge and ignore rows off screen', () => {
    const screen = new Screen({ width: 4, height: 1, output: createOutput() });
    screen.write(1, 0, 'abcdef');
    screen.write(0, 5, 'ignored');
    expect(screen.toLines()).toEqual([' abc']);
  });

  it('should stop at a newline', () => {
    const screen = new Screen({ width: 10, height: 2, output: createOutput() });
    screen.write(0, 0, 'ab\ncd');
    expect(screen.toLines()).toEqual(['ab', '']);
  });

  it('should carry ANSI styles into cells', () => {
    const screen = new Screen({ width: 5, height: 1, output: createOutput() });
    screen.write(0, 0, '\x1b[31mab');
    expect(screen.cellAt(0, 0)).toEqual({ char: 'a', style: '\x1b[31m' });
    expect(screen.cellAt(2, 0)).toEqual({ char: ' ', style: '' });
  });

  it('should drop the accumulated style on a reset', () => {
    const screen = new Screen({ width: 5, height: 1, output: createOutput() });
    screen.write(0, 0, 'a\x1b[31m\x1b[1mb\x1b[0mc', '\x1b[2m');
    expect(screen.cellAt(0, 0)).toEqual({ char: 'a', style: '\x1b[2m' });
    expect(screen.cellAt(1, 0)).toEqual({ char: 'b', style: '\x1b[2m\x1b[31m\x1b[1m' });
    expect(screen.cellAt(2, 0)).toEqual({ char: 'c', style: '' });
  });

  it('should give wide characters two cells', () => {
    const screen = new Screen({ width: 6, height: 1, output: createOutput() });
    screen.write(0, 0, '日x');
    expect(screen.cellAt(0, 0)?.char).toBe('日');
    expect(screen.cellAt(1, 0)?.char).toBe('');
    expect(screen.cellAt(2, 0)?.char).toBe('x');
    expect(screen.toLines()).toEqual(['日x']);
  });

  it('should render styled lines with resets', () => {
    const screen = new Screen({ width: 4, height: 1, output: createOutput() });
    screen.write(0, 0, 'a');
    screen.write(1, 0, 'b', '\x1b[1m');
    expect(screen.toLines(true)).toEqual(['a\x1b[0m\x1b[1mb\x1b[0m']);
  });

  describe('glyph capability', () => {
    it('should throw ProbeUnavailableError without a query', () => {
      const screen = new Screen({ width: 4, height: 1, output: createOutput() });
      expect(() => screen.canDisplay('─')).toThrow(ProbeUnavailableError);
    });

    it('should answer through the configured query', () => {
      const screen = new Screen({ width: 4, height: 1, output: createOutput(), canDisplay: asciiQuery });
      expect(screen.canDisplay('a')).toBe(true);
      expect(screen.canDisplay('─')).toBe(false);
    });

    it('should reject undisplayable glyphs in strict mode', () => {
      const screen = new Screen({
        width: 8,
        height: 1,
        output: createOutput(),
        canDisplay: asciiQuery,
        strictGlyphs: true,
      });
      expect(() => screen.write(1, 0, 'ab─')).toThrow(RenderError);
      try {
        screen.write(1, 0, 'ab─');
      } catch (err) {
        expect(err).toBeInstanceOf(RenderError);
        if (err instanceof RenderError) {
          expect(err.char).toBe('─');
          expect(err.x).toBe(3);
          expect(err.y).toBe(0);
        }
      }
    });

    it('should draw anything when not strict', () => {
      const screen = new Screen({ width: 4, height: 1, output: createOutput(), canDisplay: asciiQuery });
      screen.write(0, 0, '─');
      expect(screen.toLines()).toEqual(['─']);
    });
  });

  describe('transaction', () => {
    it('should keep writes when the callback succeeds', () => {
      const screen = new Screen({ width: 4, height: 1, output: createOutput() });
      const result = screen.transaction(() => {
        screen.write(0, 0, 'ok');
        return 7;
      });
      expect(result).toBe(7);
      expect(screen.toLines()).toEqual(['ok']);
    });

    it('should restore every cell when the callback throws', () => {
      const screen = new Screen({ width: 6, height: 2, output: createOutput() });
      screen.write(0, 0, 'keep');
      expect(() =>
        screen.transaction(() => {
          screen.write(0, 0, 'XXXXXX');
          screen.write(0, 1, 'YY');
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(screen.toLines()).toEqual(['keep', '']);
    });
  });

  it('should keep overlapping content on resize', () => {
    const screen = new Screen({ width: 5, height: 2, output: createOutput() });
    screen.write(0, 0, 'abcde');
    screen.write(0, 1, 'fghij');
    screen.resize(3, 3);
    expect(screen.getSize()).toEqual({ width: 3, height: 3 });
    expect(screen.toLines()).toEqual(['abc', 'fgh', '']);
  });

  it('should resize when the output reports a resize', () => {
    let listener: (() => void) | undefined;
    const output = {
      ...createOutput(),
      columns: 4,
      rows: 2,
      on: (_event: 'resize', fn: () => void) => {
        listener = fn;
      },
    };
    const screen = new Screen({ output });
    const onResize = vi.fn();
    screen.followResize(onResize);

    output.columns = 6;
    output.rows = 3;
    listener?.();

    expect(onResize).toHaveBeenCalledWith(6, 3);
    expect(screen.getSize()).toEqual({ width: 6, height: 3 });
  });

  it('should keep combining marks in the cell before them', () => {
    const screen = new Screen({ width: 6, height: 1, output: createOutput() });
    screen.write(0, 0, 'e\u0301x');
    expect(screen.cellAt(0, 0)?.char).toBe('e\u0301');
    expect(screen.cellAt(1, 0)?.char).toBe('x');
  });

  it('should attach a combining mark to a wide character, not its continuation', () => {
    const screen = new Screen({ width: 6, height: 1, output: createOutput() });
    screen.write(0, 0, '日\u0301a');
    expect(screen.cellAt(0, 0)?.char).toBe('日\u0301');
    expect(screen.cellAt(1, 0)?.char).toBe('');
    expect(screen.cellAt(2, 0)?.char).toBe('a');
  });

  describe('rendering', () => {
    it('should only write changed cells on diff render', () => {
      const output = createOutput();
      const screen = new Screen({ width: 3, height: 1, output });
      screen.write(1, 0, 'x');
      screen.render();
      expect(output.chunks[0]).toBe('\x1b[1;2Hx\x1b[0m\x1b[1;1H\x1b[?25h');

      screen.render();
      expect(output.chunks[1]).toBe('\x1b[0m\x1b[1;1H\x1b[?25h');
    });

    it('should redraw every cell on full render', () => {
      const output = createOutput();
      const screen = new Screen({ width: 2, height: 2, output });
      screen.write(0, 0, 'ab');
      screen.fullRender();
      expect(output.chunks[0]).toBe('\x1b[?25l\x1b[Hab\r\n  \x1b[0m\x1b[1;1H\x1b[?25h');
    });

    it('should redraw everything on the first render after a resize', () => {
      const output = createOutput();
      const screen = new Screen({ width: 10, height: 2, output });
      screen.write(0, 0, 'abcdef');
      screen.fullRender();

      screen.resize(12, 2);
      screen.clear();
      screen.write(0, 0, 'x');
      screen.render();
      expect(output.chunks[1]).toBe(
        '\x1b[?25l\x1b[H' + 'x' + ' '.repeat(11) + '\r\n' + ' '.repeat(12) + '\x1b[0m\x1b[1;1H\x1b[?25h'
      );

      screen.render();
      expect(output.chunks[2]).toBe('\x1b[0m\x1b[1;1H\x1b[?25h');
    });

    it('should move the cursor to the position set last', () => {
      const output = createOutput();
      const screen = new Screen({ width: 4, height: 3, output });
      screen.setCursor(9, 1);
      screen.render();
      expect(output.chunks[0]).toBe('\x1b[0m\x1b[2;4H\x1b[?25h');
    });

    it('should switch to the alternate buffer and back', () => {
      const output = createOutput();
      const screen = new Screen({ width: 2, height: 1, output });
      screen.init();
      screen.cleanup();
      expect(output.chunks[0].startsWith('\x1b[?1049h')).toBe(true);
      expect(output.chunks[1].endsWith('\x1b[?1049l')).toBe(true);
    });
  });
});
