export * from './record.js';
export * from './dedup.js';
