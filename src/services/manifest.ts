import { promises as fs } from 'node:fs';

import { describeError, isObjectRecord } from './fsUtils';
import { ManifestInvalidError } from './pipelineErrors';
import type { GameSpec } from '../types';

const safeGameNamePattern = /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/;
const reservedGameNames = new Set(['static', 'index.html']);

export function isSafeGameName(name: string): boolean {
  return safeGameNamePattern.test(name) && !name.includes('..') && !reservedGameNames.has(name.toLowerCase());
}

function readRequiredString(
  entry: Record<string, unknown>,
  field: string,
  label: string,
  problems: string[]
): string | null {
  const value = entry[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    problems.push(`${label}: "${field}" must be a non-empty string`);
    return null;
  }

  return value.trim();
}

function readTags(entry: Record<string, unknown>, label: string, problems: string[]): string[] {
  const { tags } = entry;
  if (tags === undefined || tags === null) {
    return [];
  }

  if (!Array.isArray(tags) || !tags.every((tag): tag is string => typeof tag === 'string')) {
    problems.push(`${label}: "tags" must be an array of strings`);
    return [];
  }

  return tags;
}

function readDescription(entry: Record<string, unknown>, label: string, problems: string[]): string {
  const { description } = entry;
  if (description === undefined || description === null) {
    return '';
  }

  if (typeof description !== 'string') {
    problems.push(`${label}: "description" must be a string`);
    return '';
  }

  return description;
}

export function parseManifest(value: unknown): GameSpec[] {
  if (!Array.isArray(value)) {
    throw new ManifestInvalidError(['manifest must be a JSON array of game records']);
  }

  const problems: string[] = [];
  const specs: GameSpec[] = [];
  const seenNames = new Set<string>();

  value.forEach((entry: unknown, index) => {
    const label = `entry ${index}`;
    if (!isObjectRecord(entry) || Array.isArray(entry)) {
      problems.push(`${label}: must be an object`);
      return;
    }

    const name = readRequiredString(entry, 'name', label, problems);
    const sourceUrl = readRequiredString(entry, 'repo_url', label, problems);
    const buildCommand = readRequiredString(entry, 'build_command', label, problems);
    const description = readDescription(entry, label, problems);
    const tags = readTags(entry, label, problems);

    if (name !== null) {
      if (!isSafeGameName(name)) {
        problems.push(`${label}: name "${name}" is not a safe path segment`);
      } else if (seenNames.has(name)) {
        problems.push(`${label}: name "${name}" is already used by another entry`);
      }

      seenNames.add(name);
    }

    if (name === null || sourceUrl === null || buildCommand === null) {
      return;
    }

    specs.push(
      Object.freeze({
        name,
        sourceUrl,
        description,
        tags: Object.freeze([...tags]),
        buildCommand
      })
    );
  });

  if (problems.length > 0) {
    throw new ManifestInvalidError(problems);
  }

  return specs;
}

export async function loadManifest(manifestPath: string): Promise<GameSpec[]> {
  let serializedManifest: string;
  try {
    serializedManifest = await fs.readFile(manifestPath, 'utf8');
  } catch (error: unknown) {
    throw new ManifestInvalidError([`unable to read ${manifestPath}: ${describeError(error)}`], { cause: error });
  }

  let rawManifest: unknown;
  try {
    rawManifest = JSON.parse(serializedManifest) as unknown;
  } catch (error: unknown) {
    throw new ManifestInvalidError([`${manifestPath} is not valid JSON: ${describeError(error)}`], { cause: error });
  }

  return parseManifest(rawManifest);
}
