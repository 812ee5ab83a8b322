/**
 * Row arithmetic shared by the layout and the list/content widgets.
 */

export const LAYOUT_OVERHEAD = 4; // header + title bar + bottom separator + footer

export interface LayoutDimensions {
  width: number;
  height: number;
  headerHeight: number;
  mainPaneTop: number;
  mainPaneHeight: number;
  footerRow: number;
}

/**
 * Calculate layout dimensions based on terminal size.
 */
export function calculateLayout(terminalHeight: number, terminalWidth: number): LayoutDimensions {
  const headerHeight = 1;
  return {
    width: terminalWidth,
    height: terminalHeight,
    headerHeight,
    mainPaneTop: headerHeight + 1,
    mainPaneHeight: Math.max(1, terminalHeight - LAYOUT_OVERHEAD),
    footerRow: terminalHeight - 1,
  };
}

/**
 * Return the scroll offset that keeps `row` inside a window of `visibleRows`,
 * moving the window as little as possible.
 */
export function scrollToKeepVisible(row: number, offset: number, visibleRows: number): number {
  if (visibleRows <= 0) return 0;
  if (row < offset) return Math.max(0, row);
  if (row >= offset + visibleRows) return row - visibleRows + 1;
  return Math.max(0, offset);
}

/**
 * Clamp a list scroll offset so the window never runs past the end of the list.
 */
export function clampScrollOffset(offset: number, totalRows: number, visibleRows: number): number {
  const maxOffset = Math.max(0, totalRows - visibleRows);
  return Math.max(0, Math.min(offset, maxOffset));
}

/**
 * Numeric terminal dimension, or the fallback when blessed has none yet.
 */
export function dimensionOr(value: number | string | undefined, fallback: number): number {
  return typeof value === 'number' && value > 0 ? value : fallback;
}
