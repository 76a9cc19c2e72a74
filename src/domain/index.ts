/**
 * Domain Module - pure statistics helpers
 *
 * Everything here is synchronous computation over plain values.
 */

export * from './stats';
