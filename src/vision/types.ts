/**
 * Vision System Type Definitions
 *
 * Types for region selection and screen capture.
 */

/**
 * Screen rectangle in pixels, relative to the captured display
 */
export interface CaptureRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

export type RegionMode = 'manual' | 'interactive';

/**
 * One captured region, owned by the run that grabbed it
 */
export interface CapturedFrame {
  /** PNG-encoded image of the region */
  image: Buffer;
  /** Region the image was cut from (equal to the requested region) */
  region: CaptureRegion;
  /** Timestamp when captured (Unix ms) */
  capturedAt: number;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * Outcome of an interactive drag: press and release points, or the cancel key
 */
export type DragResult =
  | { kind: 'released'; start: Point; end: Point }
  | { kind: 'cancelled' };

/**
 * Interactive selection surface. Resolves once the pointer is released, the
 * cancel key is pressed or the signal aborts (reported as cancelled).
 */
export interface DragOverlay {
  awaitDrag(signal?: AbortSignal): Promise<DragResult>;
}

export type RegionSelection =
  | { kind: 'selected'; region: CaptureRegion }
  | { kind: 'cancelled' };

/**
 * Source of full-display screenshots (PNG)
 */
export interface ScreenSource {
  captureDisplay(): Promise<Buffer>;
}
