/**
 * Error classification module.
 */

export * from './errorTypes.js';
export * from './classificationRules.js';
export * from './errorClassifier.js';
