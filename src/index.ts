/**
 * Hold'em rules engine
 *
 * Hand evaluation, pot accounting and betting round rules.
 */

export * from './game';
export * from './economy';
