export const FILE_STATUSES = ['pending', 'in_progress', 'processed'] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

export const FILE_NOT_FOUND = 'Not found';

export type FileStatusLookup = FileStatus | typeof FILE_NOT_FOUND;

/** A raw vendor payload persisted to blob storage, awaiting transformation. */
export interface StagingFile {
  readonly filename: string;
  readonly integrationId: string;
  readonly createdAt: Date;
  /** `unregistered` is observed, never stored: the file is in none of the groups. */
  readonly status: FileStatus | 'unregistered';
}
