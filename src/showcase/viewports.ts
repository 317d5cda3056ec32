/**
 * Per-viewport decorations
 *
 * Each open viewport owns exactly one decoration. Decorations are created
 * and dropped by lifecycle events, never by inspecting viewports directly.
 */

export type ViewportEvent =
  | { type: 'opened'; id: string; width: number; height: number }
  | { type: 'resized'; id: string; width: number; height: number }
  | { type: 'closed'; id: string };

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface ViewportDecoration {
  id: string;
  color: Rgb;
  label: string;
  width: number;
  height: number;
}

export type ViewportListener = (decorations: readonly ViewportDecoration[]) => void;

export const DECORATION_PALETTE: readonly Rgb[] = [
  { r: 240, g: 42, b: 48 },
  { r: 46, g: 160, b: 67 },
  { r: 56, g: 120, b: 220 },
  { r: 220, g: 160, b: 30 },
  { r: 150, g: 80, b: 200 },
  { r: 30, g: 170, b: 170 },
];

export class ViewportTracker {
  private readonly decorationsById = new Map<string, ViewportDecoration>();
  private readonly listeners = new Set<ViewportListener>();
  private opened = 0;

  /**
   * Apply a lifecycle event. Returns whether any decoration changed.
   */
  dispatch(event: ViewportEvent): boolean {
    const changed = this.apply(event);
    if (changed) {
      const snapshot = this.decorations();
      for (const listener of this.listeners) {
        listener(snapshot);
      }
    }
    return changed;
  }

  private apply(event: ViewportEvent): boolean {
    const current = this.decorationsById.get(event.id);

    switch (event.type) {
      case 'opened':
        if (current) {
          return this.resize(current, event.width, event.height);
        }
        this.decorationsById.set(event.id, {
          id: event.id,
          color: DECORATION_PALETTE[this.opened % DECORATION_PALETTE.length],
          label: `viewport ${event.id} ${event.width}x${event.height}`,
          width: event.width,
          height: event.height,
        });
        this.opened++;
        return true;

      case 'resized':
        return current ? this.resize(current, event.width, event.height) : false;

      case 'closed':
        return this.decorationsById.delete(event.id);
    }
  }

  private resize(decoration: ViewportDecoration, width: number, height: number): boolean {
    if (decoration.width === width && decoration.height === height) return false;
    this.decorationsById.set(decoration.id, {
      ...decoration,
      width,
      height,
      label: `viewport ${decoration.id} ${width}x${height}`,
    });
    return true;
  }

  /**
   * Decorations in opening order
   */
  decorations(): readonly ViewportDecoration[] {
    return [...this.decorationsById.values()];
  }

  subscribe(listener: ViewportListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
