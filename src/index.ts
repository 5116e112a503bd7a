export * from './errors.js';
export { isObject } from './json.js';
export type { JsonObject } from './json.js';
export * from './content.js';
export * from './message.js';
export * from './request.js';
export * from './response.js';
export * from './client.js';
