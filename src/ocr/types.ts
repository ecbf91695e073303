/**
 * OCR Type Definitions
 */

import { z } from 'zod';
import type { CapturedFrame, CaptureRegion } from '../vision/types';

/**
 * Tesseract options. `language` is one or more traineddata codes joined by
 * `+` (`eng`, `chi_sim`, `eng+fra`).
 */
export const ocrOptionsSchema = z.object({
  language: z
    .string()
    .regex(/^[A-Za-z0-9_]+(\+[A-Za-z0-9_]+)*$/, 'Expected language codes such as "eng" or "eng+fra"'),
  /** OCR engine mode (--oem), 0-3 */
  engineMode: z.number().int().min(0).max(3),
  /** Page segmentation mode (--psm), 0-13 */
  segmentationMode: z.number().int().min(0).max(13),
});

export type OcrOptions = z.infer<typeof ocrOptionsSchema>;

/** Points back at the frame without holding its pixels */
export interface FrameRef {
  region: CaptureRegion;
  capturedAt: number;
}

/**
 * Recognized text. Empty text means nothing was detected; it is not an error.
 */
export interface OcrResult {
  text: string;
  sourceFrameRef: FrameRef;
}

export interface OcrEngine {
  recognize(frame: CapturedFrame, options: OcrOptions): Promise<OcrResult>;
}
