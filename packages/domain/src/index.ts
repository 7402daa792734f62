// Case-file records, enums and role levels
export * from './case-files.js';

// Batch sizing for the bulk pipeline
export * from './batch-plan.js';

// Size-tiered compression settings
export * from './compression-tiers.js';
