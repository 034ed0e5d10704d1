export { ExportApiClient } from './api/client.js';
export { EVENT_TYPES } from './api/schemas.js';
export type { EventType } from './api/schemas.js';
export { loadConfig, ConfigError, DEFAULT_CONFIG, LOG_LEVELS } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export { buildExports, generateCsv, EXPORT_SPECS } from './mock/synthetic-export.js';
export type { ExportSpec, ExportMeta, DownloadMeta } from './mock/synthetic-export.js';
