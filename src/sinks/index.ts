export * from './types';
export * from './clipboard';
export * from './answer-file';
export * from './webhooks';
export * from './dispatcher';
