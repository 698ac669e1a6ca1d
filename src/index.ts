/**
 * Legislative tracker library entry point.
 * The command line lives in src/cli/tracker.ts.
 */

export { getConfig, loadConfig, resetConfig, loadTrackerSettings, parseTrackerSettings } from './config/index.js';
export { ConfigSchema, TrackerSettingsSchema } from './types/index.js';
export type { Config, TrackerSettings, Priority, PriorityKeywords } from './types/index.js';
export * from './state/index.js';
export * from './sources/index.js';
export * from './digest/index.js';
export { EmailClient, formatCommentAlert, renderEmailHtml, SENDGRID_API_URL } from './notifications/email.js';
export type { EmailResult, EmailClientOptions } from './notifications/email.js';
export * from './tracker/index.js';
export { createChildLogger, getLogger } from './utils/logger.js';
