/**
 * @inapp/core - shared building blocks for in-app remote data sync
 *
 * - Schedule and remote data types ({@link Schedule}, {@link RemoteDataMetadata})
 * - Structured errors ({@link InAppError})
 * - Durable preference storage ({@link PreferenceStore})
 *
 * @packageDocumentation
 * @module @inapp/core
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Preferences
export * from './preferences/index.js';
