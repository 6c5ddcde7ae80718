// Wire types of the follower relay API
export * from './enums.js';
export * from './followers.js';
export * from './audit.js';
export * from './api.js';
