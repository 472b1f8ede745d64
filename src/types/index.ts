export type * from './config.js';
export type * from './markdown.js';
