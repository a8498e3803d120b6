import type { FileStatus, FileStatusLookup } from '../../entities/staging-file.js';

// ---------------------------------------------------------------------------
// Action inputs
// ---------------------------------------------------------------------------

export interface FileActionInput {
  filename: string;
}

export interface SetFileStatusInput extends FileActionInput {
  status: FileStatus;
}

export interface ProcessObservationsInput {
  filename?: string;
}

// ---------------------------------------------------------------------------
// Action results (wire shapes, snake_case)
// ---------------------------------------------------------------------------

export interface PullObservationsResult {
  observations_extracted: number;
  transmissions_file: string;
  data_points_file: string;
}

export interface ProcessObservationsResult {
  observations_processed: number;
  message?: string;
}

export interface FileStatusResult {
  file_status: FileStatusLookup;
  message?: string;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface IntegrationActionsPort {
  pullObservations(integrationId: string): Promise<PullObservationsResult>;
  processObservations(
    integrationId: string,
    input: ProcessObservationsInput,
  ): Promise<ProcessObservationsResult>;
  getFileStatus(integrationId: string, input: FileActionInput): Promise<FileStatusResult>;
  setFileStatus(integrationId: string, input: SetFileStatusInput): Promise<FileStatusResult>;
  reprocessFile(integrationId: string, input: FileActionInput): Promise<ProcessObservationsResult>;
}
