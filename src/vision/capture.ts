/**
 * Screen Capture Module
 *
 * Grabs the display through screenshot-desktop and cuts the requested region
 * out of it with sharp. The display image is also the bounds check: a region
 * that does not fit inside it fails with CaptureError.
 */

import sharp from 'sharp';
import { CaptureError } from '../errors';
import { createLogger, describeError } from '../logging/logger';
import { isValidRegion } from './region';
import type { CapturedFrame, CaptureRegion, ScreenSource } from './types';

const log = createLogger('capture');

const THUMBNAIL_WIDTH = 960;
const THUMBNAIL_HEIGHT = 540;

type ScreenshotFn = (options: { format: 'png'; screen?: string }) => Promise<Buffer>;

// Loaded lazily so the native backend is only touched when a capture runs
let screenshot: ScreenshotFn | null = null;

async function getScreenshot(): Promise<ScreenshotFn> {
  if (screenshot) return screenshot;

  const mod = await import('screenshot-desktop');
  screenshot = (options) => mod.default(options);
  log.debug('screenshot-desktop loaded');
  return screenshot;
}

/**
 * Screen source backed by screenshot-desktop
 */
export function createDesktopScreenSource(display?: string): ScreenSource {
  return {
    async captureDisplay() {
      const shoot = await getScreenshot();
      return shoot(display ? { format: 'png', screen: display } : { format: 'png' });
    },
  };
}

function fitsInside(region: CaptureRegion, width: number, height: number): boolean {
  return (
    region.left >= 0 &&
    region.top >= 0 &&
    region.left + region.width <= width &&
    region.top + region.height <= height
  );
}

export class FrameGrabber {
  constructor(
    private readonly source: ScreenSource,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Capture one region. No retry: a failure ends the run.
   */
  async grab(region: CaptureRegion): Promise<CapturedFrame> {
    if (!isValidRegion(region)) {
      throw new CaptureError(
        `Invalid capture region ${region.width}x${region.height} at (${region.left}, ${region.top})`
      );
    }

    let display: Buffer;
    try {
      display = await this.source.captureDisplay();
    } catch (error) {
      throw new CaptureError(`Screen capture failed: ${describeError(error)}`, { cause: error });
    }

    const capturedAt = this.now();

    let image: Buffer;
    try {
      const { width, height } = await sharp(display).metadata();
      if (width === undefined || height === undefined) {
        throw new CaptureError('Screen capture returned an image without dimensions');
      }
      if (!fitsInside(region, width, height)) {
        throw new CaptureError(
          `Region ${region.width}x${region.height} at (${region.left}, ${region.top}) lies outside the ${width}x${height} display`
        );
      }
      image = await sharp(display)
        .extract({ left: region.left, top: region.top, width: region.width, height: region.height })
        .png()
        .toBuffer();
    } catch (error) {
      if (error instanceof CaptureError) throw error;
      throw new CaptureError(`Failed to process screenshot: ${describeError(error)}`, { cause: error });
    }

    log.debug('Captured region', { ...region, bytes: image.length });
    return { image, region: { ...region }, capturedAt };
  }
}

/**
 * Create a PNG data URL of the frame scaled down for display
 */
export async function createThumbnail(frame: CapturedFrame): Promise<string> {
  const png = await sharp(frame.image)
    .resize({
      width: THUMBNAIL_WIDTH,
      height: THUMBNAIL_HEIGHT,
      fit: 'inside',
      withoutEnlargement: true,
    })
    .png()
    .toBuffer();
  return `data:image/png;base64,${png.toString('base64')}`;
}
