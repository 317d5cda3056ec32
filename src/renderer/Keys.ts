/**
 * Raw keypress handling for the pager
 */

export interface KeyEvent {
  key: string;
  ctrl: boolean;
  raw: string;
}

export type KeyHandler = (event: KeyEvent) => void;

/**
 * Minimal readable the key reader listens on. process.stdin satisfies it.
 */
export interface KeySource {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (data: string) => void): unknown;
  removeListener(event: 'data', listener: (data: string) => void): unknown;
}

/**
 * Parse raw input into KeyEvent
 */
export function parseKey(data: string): KeyEvent {
  const event: KeyEvent = { key: '', ctrl: false, raw: data };

  // Mouse wheel (SGR format: \x1b[<button;x;yM), 64 = up, 65 = down
  const mouseMatch = data.match(/^\x1b\[<(\d+);\d+;\d+[Mm]$/);
  if (mouseMatch) {
    const button = parseInt(mouseMatch[1], 10);
    event.key = button === 64 ? 'scrollup' : button === 65 ? 'scrolldown' : 'mouse';
    return event;
  }

  if (data === '\r' || data === '\n' || data === '\r\n') {
    event.key = 'enter';
    return event;
  }

  if (data === '\x1b') {
    event.key = 'escape';
    return event;
  }

  if (data === ' ') {
    event.key = 'space';
    return event;
  }

  if (data.startsWith('\x1b[') || data.startsWith('\x1bO')) {
    switch (data.slice(2)) {
      case 'A':
        event.key = 'up';
        break;
      case 'B':
        event.key = 'down';
        break;
      case 'H':
      case '1~':
        event.key = 'home';
        break;
      case 'F':
      case '4~':
        event.key = 'end';
        break;
      case '5~':
        event.key = 'pageup';
        break;
      case '6~':
        event.key = 'pagedown';
        break;
      default:
        event.key = 'unknown';
    }
    return event;
  }

  // Ctrl+letter (0x01-0x1a maps to a-z)
  const code = data.charCodeAt(0);
  if (data.length === 1 && code >= 1 && code <= 26) {
    event.key = String.fromCharCode(code + 96);
    event.ctrl = true;
    return event;
  }

  event.key = data;
  return event;
}

export class KeyReader {
  private handlers: KeyHandler[] = [];
  private dataHandler: ((data: string) => void) | null = null;

  constructor(
    private readonly source: KeySource = process.stdin,
    private readonly output: { write(chunk: string): unknown } = process.stdout
  ) {}

  /**
   * Start listening for input
   */
  start(): void {
    if (this.source.isTTY) {
      this.source.setRawMode?.(true);
    }
    this.source.resume();
    this.source.setEncoding('utf8');

    // SGR mouse tracking, for the wheel
    this.output.write('\x1b[?1000h\x1b[?1006h');

    this.dataHandler = (data: string) => {
      const event = parseKey(data);
      for (const handler of this.handlers) {
        handler(event);
      }
    };
    this.source.on('data', this.dataHandler);
  }

  /**
   * Stop listening
   */
  stop(): void {
    if (this.dataHandler) {
      this.source.removeListener('data', this.dataHandler);
      this.dataHandler = null;
    }

    this.output.write('\x1b[?1006l\x1b[?1000l');

    if (this.source.isTTY) {
      this.source.setRawMode?.(false);
    }
    this.source.pause();
  }

  onKey(handler: KeyHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index !== -1) {
        this.handlers.splice(index, 1);
      }
    };
  }
}
