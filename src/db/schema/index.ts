export { workItems } from './work-items';
export { taskTracking } from './task-tracking';
export { reports } from './reports';
export { runs } from './runs';
