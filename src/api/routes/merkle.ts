import { Router, Request, Response } from 'express';
import {
  Accumulator,
  ApiState,
  appendLeaves,
  checkSavedSlots,
  resetAccumulator,
  restoreAccumulator,
} from '../state';
import {
  AppendLeavesResponse,
  BatchRootResponse,
  ErrorCode,
  ErrorCodes,
  RootResponse,
  SlotsResponse,
} from '../types';
import { requireAdminKey } from '../middleware/adminAuth';
import { Digest, HASH_ALGORITHMS, computeMerkleRoot, isHashAlgorithm } from '../../merkle';

function sendError(res: Response, status: number, error: string, code: ErrorCode): void {
  res.status(status).json({ success: false, error, code });
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Create router for Merkle accumulator endpoints
 */
export function createMerkleRouter(state: ApiState): Router {
  const router = Router();

  /**
   * Resolve :algorithm to its accumulator, or respond 404
   */
  function getAccumulator(req: Request, res: Response): Accumulator | undefined {
    const algorithm = req.params.algorithm;
    const accumulator = isHashAlgorithm(algorithm) ? state.accumulators.get(algorithm) : undefined;

    if (!accumulator) {
      sendError(res, 404, `Unknown hash algorithm: ${algorithm}`, ErrorCodes.UNKNOWN_ALGORITHM);
    }
    return accumulator;
  }

  /**
   * Validate a `leaves` body field, or respond 400
   */
  function getLeaves(req: Request, res: Response): string[] | undefined {
    const leaves: unknown = req.body?.leaves;

    if (!isStringArray(leaves)) {
      sendError(res, 400, 'leaves must be an array of strings', ErrorCodes.INVALID_LEAVES);
      return undefined;
    }

    if (leaves.length > state.maxLeavesPerRequest) {
      sendError(
        res,
        400,
        `Too many leaves: ${leaves.length} (max ${state.maxLeavesPerRequest})`,
        ErrorCodes.TOO_MANY_LEAVES
      );
      return undefined;
    }

    return leaves;
  }

  /**
   * GET /merkle/algorithms
   */
  router.get('/algorithms', (_req: Request, res: Response) => {
    res.status(200).json({ success: true, algorithms: HASH_ALGORITHMS });
  });

  /**
   * GET /merkle/:algorithm/root
   * Current root of the accumulator
   */
  router.get('/:algorithm/root', (req: Request, res: Response) => {
    const accumulator = getAccumulator(req, res);
    if (!accumulator) return;

    const response: RootResponse = {
      success: true,
      algorithm: accumulator.hashFn.algorithm,
      root: accumulator.hashFn.encode(accumulator.root),
      leafCount: accumulator.tree.size,
    };
    res.status(200).json(response);
  });

  /**
   * POST /merkle/:algorithm/leaves
   * Hash and append leaves, returning the root after each one
   * Body: { leaves: string[] }
   */
  router.post('/:algorithm/leaves', (req: Request, res: Response) => {
    const accumulator = getAccumulator(req, res);
    if (!accumulator) return;

    const leaves = getLeaves(req, res);
    if (!leaves) return;

    if (leaves.length === 0) {
      sendError(res, 400, 'leaves must not be empty', ErrorCodes.INVALID_LEAVES);
      return;
    }

    const { hashFn } = accumulator;
    const roots = appendLeaves(accumulator, leaves);

    const response: AppendLeavesResponse = {
      success: true,
      algorithm: hashFn.algorithm,
      roots: roots.map(root => hashFn.encode(root)),
      root: hashFn.encode(accumulator.root),
      leafCount: accumulator.tree.size,
    };
    res.status(200).json(response);
  });

  /**
   * POST /merkle/:algorithm/batch
   * Stateless root over hashed leaves; does not touch the accumulator
   * Body: { leaves: string[] }
   */
  router.post('/:algorithm/batch', (req: Request, res: Response) => {
    const accumulator = getAccumulator(req, res);
    if (!accumulator) return;

    const leaves = getLeaves(req, res);
    if (!leaves) return;

    const { hashFn } = accumulator;
    const root = computeMerkleRoot(hashFn, leaves.map(leaf => hashFn.hash(leaf)));

    const response: BatchRootResponse = {
      success: true,
      algorithm: hashFn.algorithm,
      root: hashFn.encode(root),
      leafCount: leaves.length,
    };
    res.status(200).json(response);
  });

  /**
   * GET /merkle/:algorithm/slots
   * Saved state of the accumulator: slots plus the root they belong to
   */
  router.get('/:algorithm/slots', (req: Request, res: Response) => {
    const accumulator = getAccumulator(req, res);
    if (!accumulator) return;

    const { hashFn, tree } = accumulator;
    const response: SlotsResponse = {
      success: true,
      algorithm: hashFn.algorithm,
      slots: tree.slots.map(slot => hashFn.encode(slot)),
      root: hashFn.encode(accumulator.root),
      leafCount: tree.size,
    };
    res.status(200).json(response);
  });

  /**
   * POST /merkle/:algorithm/restore (admin)
   * Load previously saved slots
   * Body: { slots: string[], root?: string }
   */
  router.post('/:algorithm/restore', requireAdminKey, (req: Request, res: Response) => {
    const accumulator = getAccumulator(req, res);
    if (!accumulator) return;

    const slots: unknown = req.body?.slots;
    const root: unknown = req.body?.root;

    if (!isStringArray(slots)) {
      sendError(res, 400, 'slots must be an array of strings', ErrorCodes.INVALID_SLOTS);
      return;
    }

    if (root !== undefined && typeof root !== 'string') {
      sendError(res, 400, 'root must be a string', ErrorCodes.INVALID_DIGEST);
      return;
    }

    const { hashFn } = accumulator;
    let decodedSlots: Digest[];
    let decodedRoot: Digest | undefined;
    try {
      decodedSlots = slots.map(slot => hashFn.decode(slot));
      decodedRoot = root === undefined ? undefined : hashFn.decode(root);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      sendError(res, 400, message, ErrorCodes.INVALID_DIGEST);
      return;
    }

    const slotsError = checkSavedSlots(decodedSlots);
    if (slotsError) {
      sendError(res, 400, slotsError, ErrorCodes.INVALID_SLOTS);
      return;
    }

    restoreAccumulator(accumulator, decodedSlots, decodedRoot);
    console.log(
      `Merkle: restored ${hashFn.algorithm} accumulator ` +
      `(${decodedSlots.length} slots, ${accumulator.tree.size} leaves)`
    );

    const response: RootResponse = {
      success: true,
      algorithm: hashFn.algorithm,
      root: hashFn.encode(accumulator.root),
      leafCount: accumulator.tree.size,
    };
    res.status(200).json(response);
  });

  /**
   * POST /merkle/:algorithm/reset (admin)
   * Start over with an empty accumulator
   */
  router.post('/:algorithm/reset', requireAdminKey, (req: Request, res: Response) => {
    const accumulator = getAccumulator(req, res);
    if (!accumulator) return;

    resetAccumulator(accumulator);
    console.log(`Merkle: reset ${accumulator.hashFn.algorithm} accumulator`);

    const response: RootResponse = {
      success: true,
      algorithm: accumulator.hashFn.algorithm,
      root: accumulator.hashFn.encode(accumulator.root),
      leafCount: 0,
    };
    res.status(200).json(response);
  });

  return router;
}
