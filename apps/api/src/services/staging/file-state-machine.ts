import { FILE_NOT_FOUND, FILE_STATUSES } from '@wildlife-telemetry/domain';
import type {
  BlobStoragePort,
  FileStatus,
  FileStatusLookup,
  FileStatusResult,
  GroupStorePort,
} from '@wildlife-telemetry/domain';
import { KeyedMutex } from './keyed-mutex.js';

export const STAGING_GROUP_PREFIXES: Record<FileStatus, string> = {
  pending: 'ats_pending_files',
  in_progress: 'ats_in_progress_files',
  processed: 'ats_processed_files',
};

export function stagingGroupName(status: FileStatus, integrationId: string): string {
  return `${STAGING_GROUP_PREFIXES[status]}:${integrationId}`;
}

export type TransitionResult =
  | { kind: 'moved'; from: FileStatus; to: FileStatus }
  | { kind: 'defaulted_to_pending'; requested: FileStatus }
  | { kind: 'failed'; error: Error };

const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

/**
 * Lifecycle of staged payload files: pending → in_progress → processed.
 * Membership in the shared group store is the only source of truth; a file
 * sits in at most one group. Operations on one filename are serialized.
 */
export class FileStateMachine {
  constructor(
    readonly integrationId: string,
    private readonly groups: GroupStorePort,
    private readonly blobs: BlobStoragePort,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
  ) {}

  private group(status: FileStatus): string {
    return stagingGroupName(status, this.integrationId);
  }

  private exclusive<T>(filename: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(`${this.integrationId}:${filename}`, task);
  }

  private async lookup(filename: string): Promise<FileStatusLookup> {
    for (const status of FILE_STATUSES) {
      if (await this.groups.isMember(this.group(status), filename)) return status;
    }
    return FILE_NOT_FOUND;
  }

  /** Call once per newly staged file. */
  register(filename: string): Promise<void> {
    return this.exclusive(filename, () => this.groups.add(this.group('pending'), [filename]));
  }

  getStatus(filename: string): Promise<FileStatusLookup> {
    return this.exclusive(filename, () => this.lookup(filename));
  }

  /** Best effort: the group store is authoritative, the blob metadata only mirrors it. */
  private async recordStatus(filename: string, status: FileStatus): Promise<void> {
    try {
      await this.blobs.updateMetadata(this.integrationId, filename, { status });
    } catch (err) {
      console.error(`[file-state] could not record status '${status}' on blob '${filename}'`, {
        integrationId: this.integrationId,
        error: toError(err).message,
      });
    }
  }

  /**
   * Moves a tracked file to `target`. An untracked file is registered as
   * pending instead and the requested target is not applied. A file that
   * left its group before the move landed (another process moved it first)
   * is reported as failed and keeps whatever state that process gave it.
   */
  setStatus(filename: string, target: FileStatus): Promise<TransitionResult> {
    return this.exclusive(filename, async (): Promise<TransitionResult> => {
      let result: TransitionResult;
      try {
        const current = await this.lookup(filename);
        if (current === FILE_NOT_FOUND) {
          await this.groups.add(this.group('pending'), [filename]);
          result = { kind: 'defaulted_to_pending', requested: target };
        } else {
          const moved = await this.groups.move(this.group(current), this.group(target), [filename]);
          if (moved === 0) {
            return {
              kind: 'failed',
              error: new Error(`'${filename}' left '${current}' before it could be moved to '${target}'`),
            };
          }
          result = { kind: 'moved', from: current, to: target };
        }
      } catch (err) {
        return { kind: 'failed', error: toError(err) };
      }
      await this.recordStatus(filename, result.kind === 'moved' ? result.to : 'pending');
      return result;
    });
  }

  async listPending(): Promise<string[]> {
    const members = await this.groups.members(this.group('pending'));
    return [...members].sort();
  }

  toActionResult(result: TransitionResult, filename: string): FileStatusResult {
    switch (result.kind) {
      case 'moved':
        return {
          file_status: result.to,
          message: `File status for '${filename}' in integration '${this.integrationId}' set to '${result.to}'.`,
        };
      case 'defaulted_to_pending':
        return {
          file_status: FILE_NOT_FOUND,
          message: `File '${filename}' not found in any group. Moving file to PENDING status.`,
        };
      case 'failed':
        console.error(`[file-state] error setting status for '${filename}'`, {
          integrationId: this.integrationId,
          error: result.error.message,
        });
        return { file_status: 'pending', message: 'Error setting file status' };
    }
  }
}
