export * from './types/pods.js';
export * from './schemas/pods.js';
export * from './utils/result.js';
export * from './utils/group-tag.js';
