export * from './stack.js';
export * from './status.js';
export * from './intent.js';
export * from './environment.js';
export * from './credential.js';
