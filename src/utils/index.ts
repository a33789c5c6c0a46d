/**
 * Utility Functions
 */

export * from './address.ts';
export * from './amount.ts';
export * from './logger.ts';
export * from './outpoint.ts';
export * from './type-guards.ts';
