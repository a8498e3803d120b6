import type { ActivityEntry } from '../../entities/activity-entry.js';

export interface ActivityLogPort {
  record(entry: ActivityEntry): Promise<void>;
}
