export const SERVICE_NAME = 'task-assistant';
export const VERSION = '0.1.0';
