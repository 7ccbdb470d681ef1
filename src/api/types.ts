import { HashAlgorithm } from '../merkle';

// ============================================================================
// Accumulator Roots
// ============================================================================

export interface RootResponse {
  success: boolean;
  algorithm: HashAlgorithm;
  root: string;
  leafCount: number;
}

// ============================================================================
// Leaf Submission
// ============================================================================

export interface AppendLeavesRequest {
  leaves: string[]; // raw leaf data, hashed as UTF-8 before feeding
}

export interface AppendLeavesResponse {
  success: boolean;
  algorithm: HashAlgorithm;
  roots: string[]; // root after each leaf, in order
  root: string;
  leafCount: number;
}

// ============================================================================
// Batch Root
// ============================================================================

export interface BatchRootRequest {
  leaves: string[];
}

export type BatchRootResponse = RootResponse;

// ============================================================================
// Save / Restore
// ============================================================================

export interface SlotsResponse {
  success: boolean;
  algorithm: HashAlgorithm;
  slots: string[]; // encoded digests, index = tree level, zero digest = empty
  root: string;
  leafCount: number;
}

export interface RestoreRequest {
  slots: string[];
  root?: string; // root at the save point; zero digest when omitted
}

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  UNKNOWN_ALGORITHM: 'UNKNOWN_ALGORITHM',
  INVALID_LEAVES: 'INVALID_LEAVES',
  TOO_MANY_LEAVES: 'TOO_MANY_LEAVES',
  INVALID_SLOTS: 'INVALID_SLOTS',
  INVALID_DIGEST: 'INVALID_DIGEST',
  MISSING_ADMIN_KEY: 'MISSING_ADMIN_KEY',
  INVALID_ADMIN_KEY: 'INVALID_ADMIN_KEY',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
}
