import type { Address } from '@sluice/types';
import { UnauthorizedError } from './errors.js';

/** Addresses allowed to use the operator-only configuration surface */
export class OperatorSet {
  private members: Set<string>;

  constructor(operators: readonly Address[] = []) {
    this.members = new Set(operators.map((address) => address.toLowerCase()));
  }

  has(address: Address): boolean {
    return this.members.has(address.toLowerCase());
  }

  /** Throws UnauthorizedError unless `caller` is an operator */
  authorize(caller: Address, action: string): void {
    if (!this.has(caller)) {
      throw new UnauthorizedError(caller, action);
    }
  }

  get size(): number {
    return this.members.size;
  }
}
