/**
 * @minwool/engine - Session Module
 */

export * from './calculatorSession';
