/**
 * esprun - Steps Index
 */

export * from './uefi.js';
export * from './kernel.js';
export * from './runtime.js';
export * from './userspace.js';
export * from './deploy.js';
export * from './clean.js';
