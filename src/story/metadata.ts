/**
 * Revision bookkeeping shared by every entity.
 */

import type { RevisionNote } from "./values.ts";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface Metadata {
  createdAt: string;
  updatedAt: string;
  version: number;
  revisionNotes: RevisionNote[];
  tags: string[];
  locked: boolean;
}

export interface HasMetadata {
  metadata: Metadata;
}

export function createMetadata(clock: Clock = systemClock): Metadata {
  const now = clock().toISOString();
  return {
    createdAt: now,
    updatedAt: now,
    version: 1,
    revisionNotes: [],
    tags: [],
    locked: false,
  };
}

/** Mark an entity as modified: bump `updatedAt` and the version. */
export function touch(entity: HasMetadata, clock: Clock = systemClock): void {
  entity.metadata.updatedAt = clock().toISOString();
  entity.metadata.version += 1;
}

export function addRevisionNote(
  entity: HasMetadata,
  note: RevisionNote,
  clock: Clock = systemClock,
): void {
  entity.metadata.revisionNotes.push(note);
  touch(entity, clock);
}

/** Add a tag. Returns false if the tag was already present. */
export function addTag(
  entity: HasMetadata,
  tag: string,
  clock: Clock = systemClock,
): boolean {
  if (entity.metadata.tags.includes(tag)) return false;
  entity.metadata.tags.push(tag);
  touch(entity, clock);
  return true;
}

/** Remove a tag. Returns false if the tag was not present. */
export function removeTag(
  entity: HasMetadata,
  tag: string,
  clock: Clock = systemClock,
): boolean {
  const index = entity.metadata.tags.indexOf(tag);
  if (index === -1) return false;
  entity.metadata.tags.splice(index, 1);
  touch(entity, clock);
  return true;
}

export function setLocked(
  entity: HasMetadata,
  locked: boolean,
  clock: Clock = systemClock,
): void {
  entity.metadata.locked = locked;
  touch(entity, clock);
}
