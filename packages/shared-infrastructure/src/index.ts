/**
 * @avatar-studio/shared-infrastructure
 *
 * Environment parsing shared by the Avatar Studio packages.
 */
export * from './env/loaders.js';
