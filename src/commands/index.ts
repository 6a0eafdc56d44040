export * from './config.js';
export * from './tables.js';
export * from './projects.js';
export * from './sql.js';
export * from './session.js';
export { parseEvents } from './parse-events.js';
