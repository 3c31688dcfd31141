import { promises as fs } from 'node:fs';
import path from 'node:path';

import { hasErrorCode, isObjectRecord, writeFileAtomically } from './fsUtils';
import { isSafeGameName } from './manifest';
import type { ContentVersion, PublishedVersionRecord } from '../types';

export interface PublishedVersionStore {
  read(name: string): Promise<PublishedVersionRecord | null>;
  write(record: PublishedVersionRecord): Promise<void>;
}

export function parsePublishedVersionRecord(value: unknown): PublishedVersionRecord | null {
  if (!isObjectRecord(value)) {
    return null;
  }

  const { name, version, description, tags, publishedTime } = value;
  if (typeof name !== 'string' || name.length === 0) {
    return null;
  }

  if (typeof version !== 'string' || version.length === 0) {
    return null;
  }

  if (typeof description !== 'string') {
    return null;
  }

  if (!Array.isArray(tags) || !tags.every((tag): tag is string => typeof tag === 'string')) {
    return null;
  }

  if (typeof publishedTime !== 'string' || !Number.isFinite(Date.parse(publishedTime))) {
    return null;
  }

  return {
    name,
    version,
    description,
    tags: [...tags],
    publishedTime: new Date(Date.parse(publishedTime)).toISOString()
  };
}

function assertSafeRecordName(name: string): void {
  if (!isSafeGameName(name)) {
    throw new Error(`Invalid game name for version record: ${name}`);
  }
}

export class FilePublishedVersionStore implements PublishedVersionStore {
  private readonly stateRootPath: string;

  constructor(stateRootPath: string) {
    this.stateRootPath = stateRootPath;
  }

  recordPath(name: string): string {
    assertSafeRecordName(name);
    return path.join(this.stateRootPath, `${name}.json`);
  }

  async read(name: string): Promise<PublishedVersionRecord | null> {
    let serializedRecord: string;
    try {
      serializedRecord = await fs.readFile(this.recordPath(name), 'utf8');
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }

      throw error;
    }

    let rawRecord: unknown;
    try {
      rawRecord = JSON.parse(serializedRecord) as unknown;
    } catch {
      return null;
    }

    const record = parsePublishedVersionRecord(rawRecord);
    return record && record.name === name ? record : null;
  }

  async write(record: PublishedVersionRecord): Promise<void> {
    await writeFileAtomically(this.recordPath(record.name), `${JSON.stringify(record, null, 2)}\n`);
  }
}

export class InMemoryPublishedVersionStore implements PublishedVersionStore {
  private readonly records = new Map<string, PublishedVersionRecord>();

  constructor(initialRecords: readonly PublishedVersionRecord[] = []) {
    for (const record of initialRecords) {
      this.records.set(record.name, { ...record, tags: [...record.tags] });
    }
  }

  async read(name: string): Promise<PublishedVersionRecord | null> {
    const record = this.records.get(name);
    return record ? { ...record, tags: [...record.tags] } : null;
  }

  async write(record: PublishedVersionRecord): Promise<void> {
    this.records.set(record.name, { ...record, tags: [...record.tags] });
  }

  versionOf(name: string): ContentVersion | null {
    return this.records.get(name)?.version ?? null;
  }
}
