export * from './context.js';
export * from './money.js';
export * from './vehicle-age.js';
export * from './normalizer.js';
export * from './depreciation.js';
export * from './rules.js';
export * from './market-intelligence.js';
export * from './regional.js';
export * from './convergence.js';
export * from './dealer-economics.js';
export * from './idv-validator.js';
export * from './resale-pipeline.js';
export * from './idv-pipeline.js';
