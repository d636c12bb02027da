import type { KeyEvent } from './terminal-input';

export const OVERLAY_MAX_ROWS = 8;

export type OverlayKeyResult<T> =
  | { type: 'handled' }
  | { type: 'close' }
  | { type: 'quit' }
  | { type: 'commit'; item: T }
  | { type: 'secondary'; item: T };

export interface OverlayRow<T> {
  item: T;
  index: number;
  selected: boolean;
}

interface ListOverlayControllerOptions {
  // The key that opened the overlay also closes it.
  toggleKey: string;
  secondaryKey?: string;
  maxRows?: number;
}

export class ListOverlayController<T> {
  private readonly options: ListOverlayControllerOptions;
  private items: readonly T[] = [];
  private selectionIndex = 0;
  private scrollTop = 0;
  private visible = false;

  constructor(options: ListOverlayControllerOptions) {
    this.options = options;
  }

  open(items: readonly T[]): boolean {
    if (items.length === 0) {
      return false;
    }
    this.items = [...items];
    this.selectionIndex = 0;
    this.scrollTop = 0;
    this.visible = true;
    return true;
  }

  close(): void {
    this.visible = false;
  }

  isVisible(): boolean {
    return this.visible;
  }

  selected(): T | null {
    return this.visible ? (this.items[this.selectionIndex] ?? null) : null;
  }

  selectedIndex(): number {
    return this.selectionIndex;
  }

  moveUp(): void {
    if (this.selectionIndex > 0) {
      this.selectionIndex -= 1;
      this.followSelection();
    }
  }

  moveDown(): void {
    if (this.selectionIndex < this.items.length - 1) {
      this.selectionIndex += 1;
      this.followSelection();
    }
  }

  rows(): OverlayRow<T>[] {
    if (!this.visible) {
      return [];
    }
    return this.items
      .slice(this.scrollTop, this.scrollTop + this.maxRows())
      .map((item, offset) => {
        const index = this.scrollTop + offset;
        return { item, index, selected: index === this.selectionIndex };
      });
  }

  // Rows plus one title line.
  height(): number {
    return this.visible ? Math.min(this.items.length, this.maxRows()) + 1 : 0;
  }

  handleKey(key: KeyEvent): OverlayKeyResult<T> {
    if (key.ctrl) {
      return key.name === 'c' ? { type: 'quit' } : { type: 'handled' };
    }

    if (key.name === 'q' && !key.shift) {
      return { type: 'quit' };
    }

    if (key.name === 'escape' || (key.name === this.options.toggleKey && !key.shift)) {
      this.close();
      return { type: 'close' };
    }

    if (key.name === 'up' || key.name === 'k') {
      this.moveUp();
      return { type: 'handled' };
    }

    if (key.name === 'down' || key.name === 'j') {
      this.moveDown();
      return { type: 'handled' };
    }

    const item = this.selected();
    if (key.name === 'return' && item !== null) {
      this.close();
      return { type: 'commit', item };
    }

    if (this.options.secondaryKey && key.name === this.options.secondaryKey && !key.shift && item !== null) {
      this.close();
      return { type: 'secondary', item };
    }

    return { type: 'handled' };
  }

  private maxRows(): number {
    return this.options.maxRows ?? OVERLAY_MAX_ROWS;
  }

  private followSelection(): void {
    const rows = this.maxRows();
    if (this.selectionIndex < this.scrollTop) {
      this.scrollTop = this.selectionIndex;
    } else if (this.selectionIndex >= this.scrollTop + rows) {
      this.scrollTop = this.selectionIndex - rows + 1;
    }
  }
}
