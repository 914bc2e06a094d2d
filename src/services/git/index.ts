/**
 * Git Service Module
 *
 * @module services/git
 */

export * from './git-service.js';
