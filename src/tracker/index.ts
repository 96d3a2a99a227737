export { ChangeTracker, MATERIALITY_THRESHOLD, isMaterial, type ChangeTrackerOptions } from './change-tracker.js';
