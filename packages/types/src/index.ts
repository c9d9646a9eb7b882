export type * from './logging/ILogger.js';
export type * from './module/index.js';
export type * from './widget/index.js';
export type * from './connector/index.js';
