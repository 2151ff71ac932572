export * from './validation/index.js';
export { validateConfig } from './shared/config.js';
