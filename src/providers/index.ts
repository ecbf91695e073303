/**
 * AI Provider System
 *
 * Provides a unified, provider-agnostic interface for calling hosted language
 * models, plus health checks.
 */

export * from './types';
export * from './registry';
export * from './client';
export * from './router';
export * from './health';
