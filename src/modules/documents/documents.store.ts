import type { DocumentDescriptor } from "../applications/application.types";

export type StoredDocument = {
  descriptor: DocumentDescriptor;
  buffer: Buffer;
};

/** Holds uploaded bytes until the workflow no longer needs them. */
export interface DocumentBlobStore {
  put(applicationId: string, documents: StoredDocument[]): Promise<void>;
  get(applicationId: string): Promise<StoredDocument[]>;
  release(applicationId: string): Promise<void>;
}

export class InMemoryDocumentBlobStore implements DocumentBlobStore {
  private readonly blobs = new Map<string, StoredDocument[]>();

  async put(applicationId: string, documents: StoredDocument[]): Promise<void> {
    this.blobs.set(applicationId, documents);
  }

  async get(applicationId: string): Promise<StoredDocument[]> {
    return this.blobs.get(applicationId) ?? [];
  }

  async release(applicationId: string): Promise<void> {
    this.blobs.delete(applicationId);
  }

  has(applicationId: string): boolean {
    return this.blobs.has(applicationId);
  }
}
