/**
 * Region Selection
 *
 * Resolves the rectangle to capture: the stored rectangle in manual mode, or a
 * rectangle dragged out on the overlay in interactive mode.
 */

import type { CaptureRegion, DragOverlay, Point, RegionMode, RegionSelection } from './types';

/** Drags smaller than this on either axis count as a cancelled selection */
export const MIN_SELECTION_SIZE = 10;

/**
 * Build a rectangle from two drag points, whatever the drag direction
 */
export function normalizeDrag(start: Point, end: Point): CaptureRegion {
  const left = Math.min(start.x, end.x);
  const top = Math.min(start.y, end.y);
  return {
    left,
    top,
    width: Math.max(start.x, end.x) - left,
    height: Math.max(start.y, end.y) - top,
  };
}

export function isValidRegion(region: CaptureRegion): boolean {
  return (
    Number.isInteger(region.left) &&
    Number.isInteger(region.top) &&
    Number.isInteger(region.width) &&
    Number.isInteger(region.height) &&
    region.width > 0 &&
    region.height > 0
  );
}

export class RegionSelector {
  constructor(private readonly overlay: DragOverlay) {}

  async resolve(mode: RegionMode, stored: CaptureRegion, signal?: AbortSignal): Promise<RegionSelection> {
    if (mode === 'manual') {
      return { kind: 'selected', region: stored };
    }

    const drag = await this.overlay.awaitDrag(signal);
    if (drag.kind === 'cancelled') {
      return { kind: 'cancelled' };
    }

    const region = normalizeDrag(drag.start, drag.end);
    if (region.width < MIN_SELECTION_SIZE || region.height < MIN_SELECTION_SIZE) {
      return { kind: 'cancelled' };
    }

    return { kind: 'selected', region };
  }
}
