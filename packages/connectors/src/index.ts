// Base connector class
export { BaseConnector, describeHttpFailure } from './core/base-connector.js';
export type { ConnectorOptions, HealthCheck, HealthStatus, HttpFailure } from './core/base-connector.js';

// Error types
export * from './errors/index.js';

// Connector implementations
export * from './jira/index.js';
export * from './policy-source/index.js';
