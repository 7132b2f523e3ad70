export * from './models.js';
export * from './sinkSchema.js';
