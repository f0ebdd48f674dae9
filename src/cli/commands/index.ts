export { initCommand } from './init.js';
export { lsCommand } from './ls.js';
export { statusCommand } from './status.js';
export { lifecycleCommand, type LifecycleOptions } from './lifecycle.js';
export { nukeCommand } from './nuke.js';
export { bootstrapCommand, validateBootstrapOptions, wantsBootstrap, type BootstrapOptions } from './bootstrap.js';
