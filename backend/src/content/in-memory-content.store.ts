import { Injectable } from '@nestjs/common';
import { ContentStoreError } from './content.errors.js';
import {
  validateContentRecord,
  type ContentStore,
  type ContentStoreOptions,
} from './content.store.js';
import type { ContentRecord, ContentRecordDraft } from './content.types.js';

/**
 * Process-local store. Records are copied in and out, so callers can never
 * mutate what other readers see. Map.set on an existing key keeps its
 * original position, which keeps id ordering stable across overwrites.
 */
@Injectable()
export class InMemoryContentStore implements ContentStore {
  private readonly records = new Map<string, ContentRecord>();

  constructor(private readonly options: ContentStoreOptions) {}

  async put(id: string, record: ContentRecordDraft): Promise<ContentRecord> {
    const validated = validateContentRecord(id, record, this.options.dimension);
    this.records.set(id, structuredClone(validated));
    return structuredClone(validated);
  }

  async get(id: string): Promise<ContentRecord> {
    const record = this.records.get(id);
    if (!record) {
      throw ContentStoreError.notFound(id);
    }
    return structuredClone(record);
  }

  async getMany(ids: readonly string[]): Promise<ContentRecord[]> {
    const found: ContentRecord[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) {
        found.push(structuredClone(record));
      }
    }
    return found;
  }

  async getAll(): Promise<string[]> {
    return [...this.records.keys()];
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}
