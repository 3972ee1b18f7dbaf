/**
 * @minwool/engine - Type Definitions
 *
 * Core data models and defaults for the cost calculator.
 */

export * from './costTypes';
export * from './defaults';
