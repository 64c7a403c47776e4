/* errors.ts — Error classes raised by the engine and its configuration layer */

import type { ZodIssue } from 'zod';
import type { NodeId } from './types';

export class UnknownNodeError extends Error {
  constructor(readonly nodeId: NodeId) {
    super(`Unknown node ${nodeId}`);
    this.name = 'UnknownNodeError';
  }
}

export class InvalidConfigError extends Error {
  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}
