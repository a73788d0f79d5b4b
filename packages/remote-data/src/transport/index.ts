/**
 * Remote data transport boundary.
 *
 * - {@link RemoteDataProvider}: the contract the sync engine consumes
 * - {@link MemoryRemoteDataProvider}: in-process provider for tests and embedders
 *   that already hold payloads in memory
 *
 * @module remote-data/transport
 */
export * from './memory.js';
export * from './types.js';
