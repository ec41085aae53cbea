/**
 * Domain model exports.
 */

export * from './artifact';
export * from './audit';
export * from './errors';
export * from './grant';
export * from './storage-object';
export * from './tag';
export * from './token';
export * from './urn';
export * from './version';
