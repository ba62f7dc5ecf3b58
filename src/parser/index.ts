// Re-export parser utilities

export * from './tagged.js';
export * from './loader.js';
export * from './serializer.js';
export * from './files.js';
export * from './config.js';
