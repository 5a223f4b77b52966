import { ErrorCode } from '../types/enums.js';
import type { ServiceError } from '../types/error.js';
import { serviceError } from '../types/error.js';
import type { ResourceBudget } from './types.js';

export class StaticBudget implements ResourceBudget {
  constructor(private amount: bigint) {}

  available(): bigint {
    return this.amount;
  }

  set(amount: bigint): void {
    this.amount = amount;
  }
}

export const unlimitedBudget: ResourceBudget = {
  available: () => BigInt(Number.MAX_SAFE_INTEGER)
};

export function checkBudget(budget: ResourceBudget, floor: bigint, purpose: string): ServiceError | undefined {
  const available = budget.available();
  if (available >= floor) return undefined;
  return serviceError(
    ErrorCode.RESOURCE_EXHAUSTED,
    `Low cycles: ${available} available, at least ${floor} required to ${purpose}`
  );
}
