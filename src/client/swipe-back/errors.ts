import { createLogger } from '../utils/logger.js';

const logger = createLogger('swipe-back');

/**
 * Raised when a caller breaks the gesture protocol, e.g. starting a second
 * drag while one is in flight or updating a released gesture.
 */
export class GestureContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GestureContractError';
  }
}

/**
 * Raised when swipe-back options fail validation
 */
export class SwipeBackConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'SwipeBackConfigError';
  }
}

let contractChecks = true;

/**
 * Toggle contract checking. With checks off a violation is logged and the
 * offending call is ignored.
 */
export function setContractChecks(enabled: boolean): void {
  contractChecks = enabled;
}

/**
 * @returns whether the contract holds and the caller may proceed
 */
export function checkContract(condition: boolean, message: string): boolean {
  if (condition) return true;
  if (contractChecks) {
    throw new GestureContractError(message);
  }
  logger.error(`Contract violation ignored: ${message}`);
  return false;
}
