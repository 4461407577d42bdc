export * from './schemas/analytics.js';
export * from './schemas/clusters.js';
export * from './schemas/errors.js';
export * from './schemas/health.js';
export * from './schemas/runs.js';
export * from './types/analytics.js';
export * from './types/clusters.js';
export * from './types/errors.js';
export * from './types/health.js';
export * from './types/runs.js';
