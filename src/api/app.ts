import express, { Express, Request, Response, NextFunction } from 'express';
import { ApiState } from './state';
import { createMerkleRouter } from './routes/merkle';
import { ErrorCodes } from './types';

/**
 * Create an Express app with all routes configured
 */
export function createApp(state: ApiState): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    const accumulators: Record<string, number> = {};
    for (const [algorithm, accumulator] of state.accumulators) {
      accumulators[algorithm] = accumulator.tree.size;
    }

    res.json({
      status: 'ok',
      accumulators,
    });
  });

  app.use('/merkle', createMerkleRouter(state));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
    });
  });

  return app;
}
