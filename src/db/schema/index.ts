export { listings } from './listings.js';
export type { ListingRow, NewListingRow } from './listings.js';

export { monitorRuns } from './monitoring.js';
export type { MonitorRun, NewMonitorRun, RunKind, RunStatus } from './monitoring.js';
