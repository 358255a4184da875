export * from './types.js';
export * from './jsonRpcClient.js';
export * from './wikiClient.js';
