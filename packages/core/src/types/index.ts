export * from './remote-data.js';
export * from './schedule.js';
