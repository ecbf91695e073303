export * from './types';
export * from './tesseract';
