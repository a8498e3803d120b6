export type BlobMetadata = Record<string, string>;

export interface BlobStoragePort {
  upload(
    integrationId: string,
    payload: string,
    destinationName: string,
    metadata: BlobMetadata,
  ): Promise<void>;
  updateMetadata(integrationId: string, blobName: string, metadata: BlobMetadata): Promise<void>;
  /** Returns null when no blob with that name exists for the integration. */
  download(integrationId: string, blobName: string): Promise<string | null>;
}
