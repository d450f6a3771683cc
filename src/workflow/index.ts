export * from './types';
export { create, JOBS_FILE, PROGRAMMERS_FILE } from './manager';
export type { WorkflowInstance } from './manager';
export { formatReport, programmingTime, elapsedInProgress, formatDateTime, formatHours, priorityLabel } from './report';
