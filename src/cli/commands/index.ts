/**
 * CLI Commands - Public API
 */

export { executeTreeCommand, type TreeCommandDeps, type TreeCommandOptions } from './tree.js';
export { executeDeleteCommand, type DeleteCommandDeps, type DeleteCommandOptions } from './delete.js';
export { executeOpenCommand, type OpenCommandDeps, type OpenCommandOptions } from './open.js';
export { executeSetRootCommand, type SetRootCommandDeps, type SetRootCommandOptions } from './set-root.js';
