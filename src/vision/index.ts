/**
 * Vision System — Region Selection & Screen Capture
 */

export * from './types';
export * from './region';
export * from './capture';
