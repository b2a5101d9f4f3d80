/**
 * @ephemera/core
 *
 * Core package exports: data model and config loader, SPI interfaces, address
 * resolution, credential publishers and the connection orchestrator.
 */

// Configuration (schemas, loader)
export * from './config/index.js';

// SPI interfaces
export * from './spi/index.js';

// Address resolution
export { AddressResolver } from './address/index.js';

// Credential publishing strategies
export * from './publishers/index.js';

// Orchestrator and session
export * from './orchestrator/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
export * from './utils/resource-guard.js';
