/**
 * Game Module
 *
 * Texas Hold'em engine and decision sources.
 */

export * from './engine';
export * from './controller';
