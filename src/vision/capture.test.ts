import sharp from 'sharp';
import { beforeAll, describe, expect, it } from 'vitest';
import { CaptureError } from '../errors';
import { createThumbnail, FrameGrabber } from './capture';
import type { CaptureRegion, ScreenSource } from './types';

let display: Buffer;

beforeAll(async () => {
  display = await sharp({
    create: { width: 1920, height: 1080, channels: 3, background: { r: 20, g: 20, b: 20 } },
  })
    .png()
    .toBuffer();
});

function source(): ScreenSource {
  return { captureDisplay: async () => display };
}

describe('FrameGrabber', () => {
  it('returns a frame whose region equals the requested region', async () => {
    const regions: CaptureRegion[] = [
      { left: 0, top: 0, width: 800, height: 600 },
      { left: 1000, top: 500, width: 920, height: 580 },
      { left: 17, top: 33, width: 1, height: 1 },
    ];
    const grabber = new FrameGrabber(source(), () => 1700000000000);

    for (const region of regions) {
      const frame = await grabber.grab(region);
      expect(frame.region).toEqual(region);
      expect(frame.capturedAt).toBe(1700000000000);
      const meta = await sharp(frame.image).metadata();
      expect(meta.width).toBe(region.width);
      expect(meta.height).toBe(region.height);
    }
  });

  it('fails with CaptureError when the region leaves the display', async () => {
    const grabber = new FrameGrabber(source());
    await expect(grabber.grab({ left: 1500, top: 0, width: 800, height: 600 })).rejects.toThrow(
      'lies outside the 1920x1080 display'
    );
    await expect(grabber.grab({ left: -1, top: 0, width: 10, height: 10 })).rejects.toBeInstanceOf(
      CaptureError
    );
  });

  it('fails with CaptureError for an empty region without capturing', async () => {
    let calls = 0;
    const grabber = new FrameGrabber({
      captureDisplay: async () => {
        calls += 1;
        return display;
      },
    });
    await expect(grabber.grab({ left: 0, top: 0, width: 0, height: 10 })).rejects.toBeInstanceOf(
      CaptureError
    );
    expect(calls).toBe(0);
  });

  it('wraps an OS capture failure in CaptureError', async () => {
    const grabber = new FrameGrabber({
      captureDisplay: async () => {
        throw new Error('could not create image from display');
      },
    });
    await expect(grabber.grab({ left: 0, top: 0, width: 10, height: 10 })).rejects.toThrow(
      'Screen capture failed: could not create image from display'
    );
  });
});

describe('createThumbnail', () => {
  it('scales large frames to fit inside 960x540', async () => {
    const frame = await new FrameGrabber(source()).grab({ left: 0, top: 0, width: 1920, height: 1080 });
    const url = await createThumbnail(frame);
    expect(url.startsWith('data:image/png;base64,')).toBe(true);
    const png = Buffer.from(url.slice('data:image/png;base64,'.length), 'base64');
    const meta = await sharp(png).metadata();
    expect(meta.width).toBe(960);
    expect(meta.height).toBe(540);
  });
});
