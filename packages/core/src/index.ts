// Re-export all models
export * from './models/index.js';

// Re-export errors
export * from './errors.js';

// Re-export report layouts
export * from './report/index.js';

// Re-export tokenization
export * from './tokenization/index.js';

// Re-export analysis
export * from './analysis/index.js';
