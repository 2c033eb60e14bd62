/**
 * uptime-sync - Uptime Robot contacts and monitors as code
 *
 * Library entry point. The CLI lives in `cli.ts`.
 */

export * from './errors.js';
export * from './model/index.js';
export * from './api/index.js';
export * from './reconcile/index.js';
export * from './registry/index.js';
export { applyDeclaration, loadDeclaration, parseDeclaration } from './manifest/loader.js';
export { resolveSettings, settingsPath, type ResolvedSettings, type SettingsOptions } from './config/settings.js';
