export { ChangeMonitor } from './monitor';
export type { ChangeMonitorOptions } from './monitor';
export type { MonitorStatus, TickCallback, TickFailure, TickReport } from './types';
