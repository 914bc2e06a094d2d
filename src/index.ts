// Library entry point

export * from './core/errors.js';
export * from './core/config.js';
export * from './core/schemas.js';
export * from './core/logger.js';
export * from './models/index.js';
export * from './services/git/index.js';
export * from './services/linker/index.js';
export { readLines, writeLine, type LineSource } from './services/input/line-reader.js';
