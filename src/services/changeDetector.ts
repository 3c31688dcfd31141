import type { PublishedVersionStore } from './versionStore';
import type { ChangeDecision, ContentVersion } from '../types';

// Only successful publishes write records, so a game whose last attempt failed
// still compares against its last good version (or nothing) and is rebuilt.
export async function detectChange(
  store: PublishedVersionStore,
  name: string,
  version: ContentVersion
): Promise<ChangeDecision> {
  const record = await store.read(name);
  if (!record || record.version !== version) {
    return 'build-needed';
  }

  return 'skip-unchanged';
}
