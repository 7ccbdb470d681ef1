// API Types
export * from './types';

// API State
export {
  Accumulator,
  ApiState,
  ApiStateOptions,
  DEFAULT_MAX_LEAVES_PER_REQUEST,
  MAX_SLOT_LEVELS,
  checkSavedSlots,
  createAccumulator,
  createApiState,
  appendLeaves,
  restoreAccumulator,
  resetAccumulator,
} from './state';

// Express App
export { createApp } from './app';

// Middleware
export { requireAdminKey, getAdminKey } from './middleware/adminAuth';

// Routes
export { createMerkleRouter } from './routes/merkle';
