export * from './content.js';
export * from './message.js';
export * from './tool.js';
export * from './config.js';
export * from './result.js';
export * from './stream.js';
export * from './request.js';
export * from './provider.js';
export * from './error.js';
