export { tasksOn, tasksToday, hasTaskOn, taskDaysInMonth } from './task-queries.js';
