/**
 * Portcullis IPC Library
 *
 * Shared types, schemas, and constants for the proxy engine, its storage
 * collaborators and the CLI.
 *
 * @packageDocumentation
 */

// Types
export type * from './types/index';

// Schemas
export * from './schemas/index';

// Constants
export * from './constants';
