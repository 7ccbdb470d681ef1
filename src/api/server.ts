import { createApp } from './app';
import { createApiState, DEFAULT_MAX_LEAVES_PER_REQUEST } from './state';
import { HASH_ALGORITHMS } from '../merkle';

const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : 3000;

// Largest leaf list accepted by /leaves and /batch in one request.
const MAX_LEAVES_PER_REQUEST = process.env.MAX_LEAVES_PER_REQUEST
  ? parseInt(process.env.MAX_LEAVES_PER_REQUEST, 10)
  : DEFAULT_MAX_LEAVES_PER_REQUEST;

function main() {
  if (!Number.isInteger(MAX_LEAVES_PER_REQUEST) || MAX_LEAVES_PER_REQUEST < 1) {
    throw new Error(`Invalid MAX_LEAVES_PER_REQUEST: ${process.env.MAX_LEAVES_PER_REQUEST}`);
  }

  const state = createApiState({ maxLeavesPerRequest: MAX_LEAVES_PER_REQUEST });
  const app = createApp(state);

  const server = app.listen(PORT, () => {
    console.log(`Merkle accumulator server running on port ${PORT}`);
    console.log(`Hash algorithms: ${HASH_ALGORITHMS.join(', ')}`);
    console.log(`Max leaves per request: ${MAX_LEAVES_PER_REQUEST}`);
    console.log(`Admin key: ${process.env.ADMIN_KEY ? '[SET]' : 'test-admin-key (default)'}`);
    console.log(`Health check: http://localhost:${PORT}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    server.close(() => {
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  console.error('Startup failed:', err);
  process.exit(1);
}
