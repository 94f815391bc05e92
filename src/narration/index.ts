/**
 * Narration Module
 */

export * from './narrator';
export * from './fallback';
export * from './openai-narrator';
export * from './bridge';
