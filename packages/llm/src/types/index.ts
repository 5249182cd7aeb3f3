export * from './config.js';
export * from './error.js';
export * from './function.js';
export * from './message.js';
export * from './provider.js';
export * from './request.js';
export * from './response.js';
export * from './stream.js';
