/**
 * @fieldwise/contracts
 *
 * Types, capability interfaces and the field-map model shared by all
 * Fieldwise packages.
 *
 * @packageDocumentation
 */

// Core model
export * from './core/field-map.js';
export * from './core/details.js';
export * from './core/document.js';
export * from './core/token.js';
export * from './core/result.js';

// Extraction
export * from './extraction/strategy.js';
export * from './extraction/registry.js';

// Optional capabilities
export * from './capabilities/layout.js';
export * from './capabilities/learned.js';

// Configuration
export * from './config/parser-config.js';
