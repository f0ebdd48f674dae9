export * from './api-client.js';
export * from './admin.js';
export * from './user.js';
export * from './assistant.js';
export * from './default-tools.js';
export * from './admin-key.js';
