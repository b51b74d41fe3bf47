export * from './types';
export * from './config';
export * from './db';
export * from './modules/feed';
export * from './modules/matcher';
export * from './modules/classifier';
export * from './modules/oracle';
export * from './modules/writer';
export * from './pipeline';
export { StringUtils } from './utils/similarity';
export { parseStartDate } from './utils/dates';
export { Logger, ErrorCategory } from './utils/logger';
export type { LogContext } from './utils/logger';
export * from './utils/errors';
