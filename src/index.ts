// ============================================================================
// ipns-dataset-client — Public API Surface
// ============================================================================

// ---- Core types & errors ---------------------------------------------------
export * from './types.js';
export * from './errors.js';
export * from './config.js';
export { createLogger, type Logger, type LogLevel, type LogMetadata } from './logger.js';

// ---- Name resolution -------------------------------------------------------
export * from './registry.js';
export * from './cache.js';
export * from './nameResolver.js';

// ---- Version chain ---------------------------------------------------------
export * from './snapshot.js';
export * from './kubo.js';
export * from './versionChain.js';

// ---- Chunk encryption ------------------------------------------------------
export * from './keyring.js';
export * from './chunkCodec.js';
export * from './codecRegistry.js';

// ---- Client ----------------------------------------------------------------
export * from './client.js';
