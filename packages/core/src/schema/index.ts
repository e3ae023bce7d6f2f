export { tasks } from './tasks.js';
export { config } from './config.js';
