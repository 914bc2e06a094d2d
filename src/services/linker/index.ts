/**
 * Location Linker Module
 *
 * Scans text for repository locations and turns them into hosting-site links.
 *
 * @module services/linker
 */

export * from './token-scanner.js';
export * from './revision-resolver.js';
export * from './repository-context.js';
export * from './location-linker.js';
