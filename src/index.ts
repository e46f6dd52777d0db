/**
 * eml-attachment-extractor - extracts attachments from .eml message files
 * into a subject- and type-organised folder tree
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export decoding utilities
export * from './encoding/index.js';

// Export MIME parser
export * from './mime/index.js';

// Export extraction pipeline
export * from './extraction/index.js';

// Export logging
export * from './logging/index.js';
