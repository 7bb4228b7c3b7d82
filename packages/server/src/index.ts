export { createApp } from './app.js';
export type { AppOptions, OutcomeListener } from './app.js';
export { loadServerConfig, DEFAULT_HOST, DEFAULT_PORT } from './config.js';
export type { ServerConfig } from './config.js';
export { attachLogger, createConsoleLogger, describeEvent } from './logging.js';
export type { Logger } from './logging.js';
export { parseQueryOptions } from './http/queryOptions.js';
export { discardBody, drainingSource, extractUpload, isMultipart, UploadError, UPLOAD_FIELD } from './http/upload.js';
export type { Upload } from './http/upload.js';
export { sendConversion, sendError, statusFor } from './http/respond.js';
export type { ResponseOutcome } from './http/respond.js';
