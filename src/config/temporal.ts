export const DEFAULT_TASK_QUEUE = 'cnc-quote-queue';

export function temporalSettings() {
  return {
    address: process.env.TEMPORAL_ADDRESS || 'localhost:7233',
    taskQueue: process.env.TEMPORAL_TASK_QUEUE || DEFAULT_TASK_QUEUE
  };
}
