export class WidgetListState {
  private offsetIndex = 0;
  private selectedIndex: number | null = null;

  /** Index of the first item on screen. */
  get offset(): number {
    return this.offsetIndex;
  }

  get selected(): number | null {
    return this.selectedIndex;
  }

  select(index: number | null): void {
    this.selectedIndex = index;
    if (index === null) {
      this.offsetIndex = 0;
    }
  }

  /**
   * Works out which items fit into `maxHeight` rows and how many rows each one
   * gets, moving the offset so the selected item is on screen. Starts from the
   * current offset and only scrolls when the selection fell out of the window.
   * With `truncate`, the last (or, after scrolling down, the first) item is
   * cut to fill the remaining rows.
   */
  computeViewport(heights: number[], maxHeight: number, truncate: boolean): number[] {
    if (heights.length === 0) {
      return [];
    }

    const lastIndex = heights.length - 1;
    const selected = Math.min(this.selectedIndex ?? 0, lastIndex);
    if (selected < this.offsetIndex) {
      this.offsetIndex = selected;
    }

    const forward: number[] = [];
    let y = 0;
    let found = false;
    for (let i = this.offsetIndex; i <= lastIndex; i += 1) {
      const height = heights[i];
      if (y + height > maxHeight) {
        if (truncate) {
          forward.push(maxHeight - y);
        }
        break;
      }

      if (i === selected) {
        found = true;
      }
      y += height;
      forward.push(height);
    }

    if (found) {
      return forward;
    }

    // Walk up from the selection to find the first item that still fits.
    const backward: number[] = [];
    y = 0;
    for (let i = selected; i >= 0; i -= 1) {
      const height = heights[i];
      if (y + height >= maxHeight) {
        // A selection exactly as tall as the window still fits on its own.
        const fillsWindow = i === selected && height === maxHeight;
        if (truncate || fillsWindow) {
          backward.unshift(maxHeight - y);
          this.offsetIndex = i;
        } else {
          this.offsetIndex = Math.min(i + 1, selected);
        }
        return backward;
      }

      backward.unshift(height);
      y += height;
    }

    this.offsetIndex = 0;
    return backward;
  }
}

export interface SelectableListOptions {
  circular?: boolean;
  truncate?: boolean;
}

export class SelectableList<T> {
  readonly state = new WidgetListState();
  items: T[];
  circular: boolean;
  truncate: boolean;

  constructor(items: T[] = [], options: SelectableListOptions = {}) {
    this.items = items;
    this.circular = options.circular ?? true;
    this.truncate = options.truncate ?? true;
  }

  next(): void {
    if (this.items.length === 0) {
      return;
    }

    const current = this.state.selected;
    const last = this.items.length - 1;
    let index = 0;
    if (current !== null) {
      if (current >= last) {
        index = this.circular ? 0 : last;
      } else {
        index = current + 1;
      }
    }
    this.state.select(index);
  }

  previous(): void {
    if (this.items.length === 0) {
      return;
    }

    const current = this.state.selected;
    const last = this.items.length - 1;
    let index = 0;
    if (current !== null) {
      if (current === 0) {
        index = this.circular ? last : 0;
      } else {
        index = Math.min(current - 1, last);
      }
    }
    this.state.select(index);
  }

  select(index: number | null): void {
    this.state.select(index);
  }

  getSelected(): T | undefined {
    const index = this.state.selected;
    return index === null ? undefined : this.items[index];
  }
}
