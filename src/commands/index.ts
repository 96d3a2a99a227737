/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { configCommand } from './config.js';
export { runCommand } from './run.js';
export { explainCommand } from './explain.js';
export { auditCommand } from './audit.js';
