/**
 * Game Controller
 *
 * Sources of player decisions.
 */

export * from './DecisionSource';
