/**
 * @minwool/engine - Export Module
 *
 * Detailed report, column explanations and xlsx export.
 */

export * from './detailedReport';
export * from './columnExplanations';
export * from './workbookExport';
