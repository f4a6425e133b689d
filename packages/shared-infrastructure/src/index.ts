/**
 * @voicescript/shared-infrastructure
 *
 * Environment parsing helpers shared by the voicescript CLIs.
 */
export * from './env/index.js';
