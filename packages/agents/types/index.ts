export * from './alerts.js';
export * from './findings.js';
export * from './synthesis.js';
export * from './events.js';
