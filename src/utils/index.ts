export { logger } from './logger.js';
export { MissingFieldsError, ExportFileError, ConfigError, errorMessage } from './errors.js';
