export * from './constants/index.js';
export * from './utils/money.utils.js';
export * from './utils/claim-workflow.utils.js';
